/**
 * Politica de acceso a evaluaciones.
 *
 * | rol           | enviar            | obtener / historial            |
 * |---------------|-------------------|--------------------------------|
 * | instructor    | asignado al exp.  | asignado a un expediente       |
 * | alumno        | no                | solo lo propio                 |
 * | admin_escuela | no                | alumnos de su escuela          |
 * | otro          | no                | no                             |
 */
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { IdentidadUsuario, OperacionEvaluacion } from '../../compartido/tipos/dominio';
import type { ExpedienteRegistrado, UsuarioRegistrado } from '../modulo_registro/registroClases';

/** Cadena de pertenencia del recurso, resuelta una vez por request. */
export type ContextoAcceso = {
  alumnoId: string;
  escuelaId: string | null;
  instructorIds: string[];
};

export function contextoDeExpediente(
  expediente: Pick<ExpedienteRegistrado, 'alumnoId' | 'instructorId'>,
  alumno: Pick<UsuarioRegistrado, 'escuelaId'> | null
): ContextoAcceso {
  return {
    alumnoId: expediente.alumnoId,
    escuelaId: alumno?.escuelaId ?? null,
    instructorIds: expediente.instructorId ? [expediente.instructorId] : []
  };
}

export function autorizar(
  operacion: OperacionEvaluacion,
  identidad: IdentidadUsuario,
  contexto: ContextoAcceso
): boolean {
  switch (identidad.rol) {
    case 'instructor':
      return contexto.instructorIds.includes(identidad.usuarioId);
    case 'alumno':
      return operacion !== 'enviar' && identidad.usuarioId === contexto.alumnoId;
    case 'admin_escuela':
      return (
        operacion !== 'enviar' &&
        identidad.escuelaId !== null &&
        contexto.escuelaId !== null &&
        identidad.escuelaId === contexto.escuelaId
      );
    default:
      return false;
  }
}

export function exigirAcceso(operacion: OperacionEvaluacion, identidad: IdentidadUsuario, contexto: ContextoAcceso) {
  if (!autorizar(operacion, identidad, contexto)) {
    throw new ErrorAplicacion('SIN_ACCESO', 'Sin acceso a esta evaluacion', 403);
  }
}
