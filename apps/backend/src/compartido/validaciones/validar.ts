/**
 * Helpers de validacion con Zod para requests.
 */
import type { NextFunction, Request, Response } from 'express';
import { ZodObject, type ZodTypeAny, type z } from 'zod';
import { ErrorAplicacion, type CodigoError } from '../errores/errorAplicacion';

type OpcionesValidacion = {
  /** Rechaza claves desconocidas en lugar de descartarlas (solo para esquemas objeto). */
  strict?: boolean;
};

function aplicarOpciones(schema: ZodTypeAny, { strict = false }: OpcionesValidacion): ZodTypeAny {
  if (strict && schema instanceof ZodObject) return schema.strict();
  return schema;
}

/**
 * Valida datos arbitrarios (p. ej. `req.query`, que en Express 5 es de solo lectura).
 */
export function validarDatos<S extends ZodTypeAny>(
  schema: S,
  datos: unknown,
  codigo: CodigoError = 'VALIDACION',
  mensaje = 'Payload invalido'
): z.infer<S> {
  const resultado = schema.safeParse(datos);
  if (!resultado.success) {
    throw new ErrorAplicacion(codigo, mensaje, 400, resultado.error.flatten());
  }
  return resultado.data;
}

export function validarCuerpo(schema: ZodTypeAny, opciones: OpcionesValidacion = {}) {
  const efectivo = aplicarOpciones(schema, opciones);
  return (req: Request, _res: Response, next: NextFunction) => {
    const resultado = efectivo.safeParse(req.body ?? {});
    if (!resultado.success) {
      next(new ErrorAplicacion('VALIDACION', 'Payload invalido', 400, resultado.error.flatten()));
      return;
    }
    req.body = resultado.data;
    next();
  };
}

/**
 * Valida los parametros de ruta (ids). Un id mal formado es `DATOS_INVALIDOS`, no `VALIDACION`.
 */
export function validarParametros(schema: ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const resultado = schema.safeParse(req.params);
    if (!resultado.success) {
      next(new ErrorAplicacion('DATOS_INVALIDOS', 'Parametros invalidos', 400, resultado.error.flatten()));
      return;
    }
    next();
  };
}
