/**
 * Esquemas Zod reutilizables entre modulos.
 */
import { z } from 'zod';

export const esquemaObjectId = z
  .string()
  .trim()
  .regex(/^[a-f\d]{24}$/i, 'Id invalido')
  .transform((valor) => valor.toLowerCase());

/** Fecha de calendario `YYYY-MM-DD` (se rechazan fechas imposibles como 2025-02-30). */
export const esquemaFechaIso = z
  .string()
  .trim()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Formato de fecha invalido, usa YYYY-MM-DD')
  .refine((valor) => {
    const fecha = new Date(`${valor}T00:00:00.000Z`);
    return !Number.isNaN(fecha.getTime()) && fecha.toISOString().slice(0, 10) === valor;
  }, 'Fecha inexistente');
