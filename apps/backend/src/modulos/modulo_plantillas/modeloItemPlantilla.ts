/**
 * Modelo de item penalizable de una plantilla.
 */
import { Schema, Types, model } from 'mongoose';
import { liberarModelo } from '../../infraestructura/baseDatos/mongoose';

export interface ItemPlantillaDoc {
  plantillaId: Types.ObjectId;
  descripcion: string;
  puntosPenalizacion: number;
  orden: number;
}

const ItemPlantillaSchema = new Schema<ItemPlantillaDoc>(
  {
    plantillaId: { type: Schema.Types.ObjectId, ref: 'PlantillaExamen', required: true, immutable: true },
    descripcion: { type: String, required: true, trim: true, maxlength: 500, immutable: true },
    puntosPenalizacion: { type: Number, required: true, min: 0, immutable: true },
    orden: { type: Number, required: true, min: 1, immutable: true }
  },
  { timestamps: true, collection: 'itemsPlantilla' }
);

ItemPlantillaSchema.index({ plantillaId: 1, descripcion: 1 }, { unique: true });
ItemPlantillaSchema.index({ plantillaId: 1, orden: 1 });

liberarModelo('ItemPlantilla');
export const ItemPlantilla = model<ItemPlantillaDoc>('ItemPlantilla', ItemPlantillaSchema);
