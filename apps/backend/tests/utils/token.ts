import { crearTokenUsuario } from '../../src/modulos/modulo_autenticacion/servicioTokens';
import type { IdentidadUsuario } from '../../src/compartido/tipos/dominio';

export function tokenPara(identidad: IdentidadUsuario) {
  return crearTokenUsuario(identidad);
}

export function cabeceraAuth(identidad: IdentidadUsuario) {
  return { Authorization: `Bearer ${tokenPara(identidad)}` };
}
