/**
 * Tokens JWT de usuario.
 *
 * El servicio de cuentas emite los tokens; este API solo los verifica y lee la identidad
 * (`usuarioId`, `rol`, `escuelaId`). `crearTokenUsuario` existe para herramientas locales y pruebas.
 */
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { configuracion } from '../../configuracion';
import { ROLES_USUARIO, type IdentidadUsuario } from '../../compartido/tipos/dominio';
import { esquemaObjectId } from '../../compartido/validaciones/esquemas';

const esquemaPayloadToken = z.object({
  usuarioId: esquemaObjectId,
  rol: z.enum(ROLES_USUARIO),
  escuelaId: esquemaObjectId.nullish()
});

export type TokenUsuarioPayload = z.input<typeof esquemaPayloadToken>;

export function crearTokenUsuario(payload: TokenUsuarioPayload) {
  return jwt.sign(payload, configuracion.jwtSecreto, {
    algorithm: 'HS256',
    expiresIn: configuracion.jwtExpiraHoras * 60 * 60
  });
}

/**
 * Lanza si la firma es invalida, el token expiro o los claims no tienen la forma esperada.
 */
export function verificarTokenUsuario(token: string): IdentidadUsuario {
  const decodificado = jwt.verify(token, configuracion.jwtSecreto, { algorithms: ['HS256'] });
  const payload = esquemaPayloadToken.parse(decodificado);
  return {
    usuarioId: payload.usuarioId,
    rol: payload.rol,
    escuelaId: payload.escuelaId ?? null
  };
}
