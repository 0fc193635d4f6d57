/**
 * Modelo EvaluacionSesion: resultado del examen practico de una clase.
 *
 * Una sola evaluacion por clase (indice unico en `claseId`). Los campos de puntaje se escriben
 * en el mismo insert que `finalizadoEn` y despues no cambian.
 */
import { Schema, Types, model } from 'mongoose';
import { RESULTADOS_EVALUACION, type ResultadoEvaluacion } from '../../compartido/tipos/dominio';
import { liberarModelo } from '../../infraestructura/baseDatos/mongoose';

export interface ErrorCometidoDoc {
  itemId: Types.ObjectId;
  cantidad: number;
}

export interface EvaluacionSesionDoc {
  claseId: Types.ObjectId;
  plantillaId: Types.ObjectId;
  errores: ErrorCometidoDoc[];
  totalPuntos: number | null;
  resultado: ResultadoEvaluacion | null;
  creadoEn: Date;
  finalizadoEn: Date | null;
}

const ErrorCometidoSchema = new Schema<ErrorCometidoDoc>(
  {
    itemId: { type: Schema.Types.ObjectId, ref: 'ItemPlantilla', required: true },
    cantidad: { type: Number, required: true, min: 1 }
  },
  { _id: false }
);

const EvaluacionSesionSchema = new Schema<EvaluacionSesionDoc>(
  {
    claseId: { type: Schema.Types.ObjectId, ref: 'Clase', required: true, immutable: true },
    plantillaId: { type: Schema.Types.ObjectId, ref: 'PlantillaExamen', required: true, immutable: true },
    errores: { type: [ErrorCometidoSchema], default: [], immutable: true },
    totalPuntos: { type: Number, min: 0, default: null, immutable: true },
    resultado: { type: String, enum: RESULTADOS_EVALUACION, default: null, immutable: true },
    creadoEn: { type: Date, required: true, immutable: true },
    finalizadoEn: { type: Date, default: null, immutable: true }
  },
  { collection: 'evaluacionesSesion' }
);

EvaluacionSesionSchema.index({ claseId: 1 }, { unique: true });

liberarModelo('EvaluacionSesion');
export const EvaluacionSesion = model<EvaluacionSesionDoc>('EvaluacionSesion', EvaluacionSesionSchema);
