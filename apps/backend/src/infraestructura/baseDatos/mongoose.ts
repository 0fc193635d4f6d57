/**
 * Conexion a MongoDB con Mongoose.
 */
import mongoose from 'mongoose';
import { configuracion } from '../../configuracion';
import { log, logError } from '../logging/logger';

export async function conectarBaseDatos() {
  if (!configuracion.mongoUri) {
    log('warn', 'MONGODB_URI no esta definido; se omite la conexion a MongoDB');
    return;
  }

  mongoose.set('strictQuery', true);

  try {
    await mongoose.connect(configuracion.mongoUri);
    log('ok', 'Conexion a MongoDB exitosa');
  } catch (error) {
    logError('Fallo la conexion a MongoDB', error);
    throw error;
  }
}

export async function desconectarBaseDatos() {
  if (mongoose.connection.readyState === 0) return;
  await mongoose.disconnect();
  log('system', 'Conexion a MongoDB cerrada');
}

/**
 * Quita un modelo ya registrado para poder volver a declararlo.
 *
 * Las pruebas recargan modulos (`vi.resetModules`) pero mongoose conserva su registro global;
 * sin esto, la segunda declaracion lanza `OverwriteModelError`.
 */
export function liberarModelo(nombre: string) {
  if (mongoose.modelNames().includes(nombre)) {
    mongoose.deleteModel(nombre);
  }
}
