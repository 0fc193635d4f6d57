/**
 * Validaciones de evaluaciones de clase.
 */
import { z } from 'zod';
import { configuracion } from '../../configuracion';
import { esquemaFechaIso, esquemaObjectId } from '../../compartido/validaciones/esquemas';

export const esquemaParametrosClase = z.object({
  claseId: esquemaObjectId
});

export const esquemaParametrosEvaluacion = z.object({
  evaluacionId: esquemaObjectId
});

export const esquemaParametrosAlumno = z.object({
  alumnoId: esquemaObjectId
});

/** Tope por entrada; las repeticiones de un item se suman despues. */
export const CANTIDAD_MAXIMA_POR_ERROR = 1000;

export const esquemaEnviarEvaluacion = z.object({
  errores: z
    .array(
      z
        .object({
          itemId: esquemaObjectId,
          cantidad: z.number().int().min(0).max(CANTIDAD_MAXIMA_POR_ERROR)
        })
        .strict()
    )
    .max(200)
    .default([]),
  puntosMaximos: z.number().int().min(0).optional()
});

export const esquemaConsultaHistorial = z.object({
  desde: esquemaFechaIso.optional(),
  hasta: esquemaFechaIso.optional(),
  pagina: z.coerce.number().int().min(1).default(1),
  tamanoPagina: z.coerce.number().int().min(1).max(100).default(configuracion.paginaTamanoDefecto)
});
