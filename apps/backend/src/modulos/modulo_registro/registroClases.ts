/**
 * Contrato del registro externo de clases, expedientes y usuarios.
 *
 * El modulo de evaluaciones solo lee de aqui; altas y cambios los hace el CRUD de la escuela.
 */
import type { RolUsuario } from '../../compartido/tipos/dominio';

export type ClaseRegistrada = {
  id: string;
  fecha: Date;
  horaInicio: string;
  horaFin: string;
  expedienteId: string | null;
};

export type ExpedienteRegistrado = {
  id: string;
  alumnoId: string;
  instructorId: string | null;
  licenciaId: string | null;
};

export type UsuarioRegistrado = {
  id: string;
  nombres: string;
  apellidos: string;
  rol: RolUsuario;
  escuelaId: string | null;
};

export type LicenciaRegistrada = {
  id: string;
  tipo: string;
};

export interface RegistroClases {
  obtenerClase(claseId: string): Promise<ClaseRegistrada | null>;
  obtenerExpediente(expedienteId: string): Promise<ExpedienteRegistrado | null>;
  obtenerUsuario(usuarioId: string): Promise<UsuarioRegistrado | null>;
  /** Instructores asignados en cualquiera de los expedientes del alumno. */
  listarInstructoresDeAlumno(alumnoId: string): Promise<string[]>;
  buscarLicenciaPorTipo(tipo: string): Promise<LicenciaRegistrada | null>;
}

export function nombreCompleto(usuario: Pick<UsuarioRegistrado, 'nombres' | 'apellidos'> | null) {
  if (!usuario) return '';
  return `${usuario.nombres} ${usuario.apellidos}`.trim();
}
