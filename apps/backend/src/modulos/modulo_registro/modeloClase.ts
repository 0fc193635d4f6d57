/**
 * Modelo Clase (cita de manejo). Lo administra el CRUD de agenda; aqui solo se lee.
 */
import { Schema, Types, model } from 'mongoose';
import { liberarModelo } from '../../infraestructura/baseDatos/mongoose';

export interface ClaseDoc {
  fecha: Date;
  horaInicio: string;
  horaFin: string;
  expedienteId?: Types.ObjectId | null;
}

const ClaseSchema = new Schema<ClaseDoc>(
  {
    fecha: { type: Date, required: true },
    horaInicio: { type: String, required: true, match: /^\d{2}:\d{2}$/ },
    horaFin: { type: String, required: true, match: /^\d{2}:\d{2}$/ },
    expedienteId: { type: Schema.Types.ObjectId, ref: 'Expediente', default: null }
  },
  { timestamps: true, collection: 'clases' }
);

ClaseSchema.index({ expedienteId: 1, fecha: -1 });

liberarModelo('Clase');
export const Clase = model<ClaseDoc>('Clase', ClaseSchema);
