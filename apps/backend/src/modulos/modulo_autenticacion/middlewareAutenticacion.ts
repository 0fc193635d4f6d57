/**
 * Middlewares para requerir sesion (JWT) y rol.
 */
import type { NextFunction, Request, Response } from 'express';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { IdentidadUsuario, RolUsuario } from '../../compartido/tipos/dominio';
import { verificarTokenUsuario } from './servicioTokens';

export type SolicitudAutenticada = Request & { usuario?: IdentidadUsuario };

export function requerirAutenticacion(req: SolicitudAutenticada, _res: Response, next: NextFunction) {
  const auth = req.headers.authorization ?? '';
  const [tipo, token] = auth.split(' ');

  if (tipo !== 'Bearer' || !token) {
    next(new ErrorAplicacion('NO_AUTORIZADO', 'Token requerido', 401));
    return;
  }

  try {
    req.usuario = verificarTokenUsuario(token);
    next();
  } catch {
    next(new ErrorAplicacion('TOKEN_INVALIDO', 'Token invalido o expirado', 401));
  }
}

/**
 * Filtro grueso por rol. La relacion con el recurso (dueño, misma escuela) la decide
 * la politica de acceso del modulo correspondiente.
 */
export function requerirRol(...roles: RolUsuario[]) {
  return (req: SolicitudAutenticada, _res: Response, next: NextFunction) => {
    const usuario = req.usuario;
    if (!usuario) {
      next(new ErrorAplicacion('NO_AUTORIZADO', 'Sesion requerida', 401));
      return;
    }
    if (!roles.includes(usuario.rol)) {
      next(new ErrorAplicacion('SIN_ACCESO', 'Rol sin acceso a esta operacion', 403));
      return;
    }
    next();
  };
}

export function obtenerIdentidad(req: SolicitudAutenticada): IdentidadUsuario {
  if (!req.usuario) {
    throw new ErrorAplicacion('NO_AUTORIZADO', 'Sesion requerida', 401);
  }
  return req.usuario;
}
