/**
 * Modelo Usuario. Cuentas y credenciales viven en el servicio de cuentas; aqui solo
 * interesan nombre, rol y escuela.
 */
import { Schema, Types, model } from 'mongoose';
import { ROLES_USUARIO, type RolUsuario } from '../../compartido/tipos/dominio';
import { liberarModelo } from '../../infraestructura/baseDatos/mongoose';

export interface UsuarioDoc {
  nombres: string;
  apellidos: string;
  rol: RolUsuario;
  escuelaId?: Types.ObjectId | null;
}

const UsuarioSchema = new Schema<UsuarioDoc>(
  {
    nombres: { type: String, required: true, trim: true },
    apellidos: { type: String, default: '', trim: true },
    rol: { type: String, enum: ROLES_USUARIO, required: true },
    escuelaId: { type: Schema.Types.ObjectId, ref: 'Escuela', default: null }
  },
  { timestamps: true, collection: 'usuarios' }
);

liberarModelo('Usuario');
export const Usuario = model<UsuarioDoc>('Usuario', UsuarioSchema);
