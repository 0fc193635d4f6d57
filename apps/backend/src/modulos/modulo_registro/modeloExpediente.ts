/**
 * Modelo Expediente (inscripcion del alumno en una categoria de licencia).
 */
import { Schema, Types, model } from 'mongoose';
import { ESTADOS_EXPEDIENTE, type EstadoExpediente } from '../../compartido/tipos/dominio';
import { liberarModelo } from '../../infraestructura/baseDatos/mongoose';

export interface ExpedienteDoc {
  alumnoId: Types.ObjectId;
  instructorId?: Types.ObjectId | null;
  licenciaId?: Types.ObjectId | null;
  estado: EstadoExpediente;
}

const ExpedienteSchema = new Schema<ExpedienteDoc>(
  {
    alumnoId: { type: Schema.Types.ObjectId, ref: 'Usuario', required: true },
    instructorId: { type: Schema.Types.ObjectId, ref: 'Usuario', default: null },
    licenciaId: { type: Schema.Types.ObjectId, ref: 'Licencia', default: null },
    estado: { type: String, enum: ESTADOS_EXPEDIENTE, default: 'borrador' }
  },
  { timestamps: true, collection: 'expedientes' }
);

ExpedienteSchema.index({ alumnoId: 1, instructorId: 1 });

liberarModelo('Expediente');
export const Expediente = model<ExpedienteDoc>('Expediente', ExpedienteSchema);
