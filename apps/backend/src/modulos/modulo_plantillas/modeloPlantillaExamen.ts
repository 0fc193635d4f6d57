/**
 * Modelo de plantilla de examen: una por licencia, con el maximo de puntos de penalizacion tolerado.
 *
 * Datos de referencia: se crean con `sembrarPlantillas` y no se modifican despues.
 */
import { Schema, Types, model } from 'mongoose';
import { liberarModelo } from '../../infraestructura/baseDatos/mongoose';

export interface PlantillaExamenDoc {
  licenciaId: Types.ObjectId;
  puntosMaximos: number;
}

const PlantillaExamenSchema = new Schema<PlantillaExamenDoc>(
  {
    licenciaId: { type: Schema.Types.ObjectId, ref: 'Licencia', required: true, immutable: true },
    puntosMaximos: { type: Number, required: true, min: 0, immutable: true }
  },
  { timestamps: true, collection: 'plantillasExamen' }
);

PlantillaExamenSchema.index({ licenciaId: 1 }, { unique: true });

liberarModelo('PlantillaExamen');
export const PlantillaExamen = model<PlantillaExamenDoc>('PlantillaExamen', PlantillaExamenSchema);
