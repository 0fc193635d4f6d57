/**
 * Punto de entrada del API de evaluaciones.
 * Inicializa configuracion, base de datos y servidor HTTP.
 */
import { crearApp } from './app';
import { configuracion } from './configuracion';
import { conectarBaseDatos, desconectarBaseDatos } from './infraestructura/baseDatos/mongoose';
import { logError, log } from './infraestructura/logging/logger';

async function iniciar() {
  await conectarBaseDatos();

  const app = crearApp();
  const servidor = app.listen(configuracion.puerto, () => {
    log('ok', 'API de evaluaciones escuchando', { puerto: configuracion.puerto, entorno: configuracion.entorno });
  });

  const detener = (senal: NodeJS.Signals) => {
    log('system', 'Deteniendo servidor', { senal });
    servidor.close(() => {
      desconectarBaseDatos()
        .then(() => process.exit(0))
        .catch((error) => {
          logError('Error al cerrar la conexion a MongoDB', error);
          process.exit(1);
        });
    });
  };
  process.once('SIGINT', detener);
  process.once('SIGTERM', detener);
}

iniciar().catch((error) => {
  logError('Error al iniciar el servidor', error);
  process.exit(1);
});
