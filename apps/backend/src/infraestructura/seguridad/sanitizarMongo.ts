/**
 * Elimina operadores de MongoDB (`$gt`, `$where`, ...) y claves con punto del input.
 *
 * Se aplica a `body` y `params`. `req.query` en Express 5 es un getter que se vuelve a
 * parsear en cada acceso, asi que las consultas se validan con Zod en cada controlador.
 */
import type { NextFunction, Request, Response } from 'express';

function esClavePeligrosa(clave: string) {
  return clave.startsWith('$') || clave.includes('.');
}

function limpiar(valor: unknown): void {
  if (Array.isArray(valor)) {
    valor.forEach(limpiar);
    return;
  }
  if (!valor || typeof valor !== 'object') return;

  for (const clave of Object.keys(valor)) {
    if (esClavePeligrosa(clave)) {
      Reflect.deleteProperty(valor, clave);
      continue;
    }
    limpiar(Reflect.get(valor, clave));
  }
}

export function sanitizarMongo() {
  return (req: Request, _res: Response, next: NextFunction) => {
    limpiar(req.body);
    limpiar(req.params);
    next();
  };
}
