/**
 * Middlewares de manejo de errores para el API.
 *
 * Contrato:
 * - Si se lanza/propaga `ErrorAplicacion`, se serializa tal cual (codigo/estado/detalles).
 * - Para errores no esperados, se registra (excepto en tests) y se devuelve 500 con un
 *   mensaje generico; el texto del error original (p. ej. de MongoDB) nunca sale al cliente.
 *
 * Nota: el formato del envelope de error es parte del contrato publico del API.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from './errorAplicacion';
import { logError } from '../../infraestructura/logging/logger';

function leerPropiedad(error: unknown, clave: string): unknown {
  if (typeof error !== 'object' || error === null) return undefined;
  return clave in error ? Reflect.get(error, clave) : undefined;
}

export function rutaNoEncontrada(req: Request, _res: Response, next: NextFunction) {
  next(new ErrorAplicacion('RUTA_NO_ENCONTRADA', `Ruta no encontrada: ${req.method} ${req.path}`, 404));
}

export function manejadorErrores(error: unknown, req: Request, res: Response, _next: NextFunction) {
  void _next;

  // IDs malformados u otros errores de casteo (p. ej. CastError/BSONError).
  const nombreError = leerPropiedad(error, 'name');
  if (nombreError === 'CastError' || nombreError === 'BSONError' || nombreError === 'BSONTypeError') {
    res.status(400).json({ error: { codigo: 'DATOS_INVALIDOS', mensaje: 'Id invalido' } });
    return;
  }

  // body-parser: payload demasiado grande (413) o JSON mal formado.
  const status = leerPropiedad(error, 'status') ?? leerPropiedad(error, 'statusCode');
  const tipo = leerPropiedad(error, 'type');
  if (status === 413 || tipo === 'entity.too.large') {
    res.status(413).json({ error: { codigo: 'PAYLOAD_DEMASIADO_GRANDE', mensaje: 'Payload demasiado grande' } });
    return;
  }
  if (tipo === 'entity.parse.failed') {
    res.status(400).json({ error: { codigo: 'JSON_INVALIDO', mensaje: 'El cuerpo no es JSON valido' } });
    return;
  }

  if (error instanceof ErrorAplicacion) {
    res.status(error.estadoHttp).json({
      error: {
        codigo: error.codigo,
        mensaje: error.message,
        detalles: error.detalles
      }
    });
    return;
  }

  if (process.env.NODE_ENV !== 'test') {
    logError('Error no controlado en request', error, { metodo: req.method, ruta: req.originalUrl });
  }

  res.status(500).json({ error: { codigo: 'ERROR_INTERNO', mensaje: 'Error interno' } });
}
