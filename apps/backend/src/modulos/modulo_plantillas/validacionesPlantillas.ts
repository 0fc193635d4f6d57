/**
 * Validaciones de plantillas de examen.
 */
import { z } from 'zod';
import { esquemaObjectId } from '../../compartido/validaciones/esquemas';

export const esquemaParametrosLicencia = z.object({
  licenciaId: esquemaObjectId
});

const esquemaDefinicionItem = z
  .object({
    descripcion: z.string().trim().min(1).max(500),
    puntosPenalizacion: z.number().int().min(0),
    orden: z.number().int().min(1).optional()
  })
  .strict();

export const esquemaDefinicionPlantilla = z
  .object({
    tipoLicencia: z.string().trim().min(1).max(5),
    puntosMaximos: z.number().int().min(0),
    items: z.array(esquemaDefinicionItem).min(1)
  })
  .strict()
  .superRefine((definicion, ctx) => {
    const vistas = new Set<string>();
    definicion.items.forEach((item, indice) => {
      const clave = item.descripcion.toLowerCase();
      if (vistas.has(clave)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['items', indice, 'descripcion'],
          message: `Descripcion repetida en la plantilla ${definicion.tipoLicencia}: ${item.descripcion}`
        });
      }
      vistas.add(clave);
    });
  });

export const esquemaDefinicionesPlantillas = z.array(esquemaDefinicionPlantilla);

export type DefinicionPlantilla = z.infer<typeof esquemaDefinicionPlantilla>;
