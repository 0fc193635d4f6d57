/**
 * Modelo Licencia (tipo de permiso: B, C, A1, ...).
 */
import { Schema, model } from 'mongoose';
import { liberarModelo } from '../../infraestructura/baseDatos/mongoose';

export interface LicenciaDoc {
  tipo: string;
}

const LicenciaSchema = new Schema<LicenciaDoc>(
  {
    tipo: { type: String, required: true, trim: true, uppercase: true, maxlength: 5, unique: true }
  },
  { timestamps: true, collection: 'licencias' }
);

liberarModelo('Licencia');
export const Licencia = model<LicenciaDoc>('Licencia', LicenciaSchema);
