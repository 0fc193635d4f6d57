/**
 * Tipos compartidos del dominio.
 */
export const ROLES_USUARIO = ['alumno', 'instructor', 'admin_escuela', 'superadmin'] as const;
export type RolUsuario = (typeof ROLES_USUARIO)[number];

export const RESULTADOS_EVALUACION = ['OK', 'FAILED'] as const;
export type ResultadoEvaluacion = (typeof RESULTADOS_EVALUACION)[number];

export const ESTADOS_EXPEDIENTE = ['borrador', 'aprobado', 'rechazado'] as const;
export type EstadoExpediente = (typeof ESTADOS_EXPEDIENTE)[number];

export type OperacionEvaluacion = 'enviar' | 'obtener' | 'historial';

/** Identidad autenticada que llega en el token; la emision del token es externa. */
export type IdentidadUsuario = {
  usuarioId: string;
  rol: RolUsuario;
  escuelaId: string | null;
};
