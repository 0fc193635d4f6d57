/**
 * Siembra las plantillas de examen definidas en `datos/plantillasExamen.json`.
 *
 * Uso: `npm run sembrar` (requiere MONGODB_URI). Se puede repetir sin efectos duplicados.
 */
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { configuracion } from '../src/configuracion';
import { conectarBaseDatos, desconectarBaseDatos } from '../src/infraestructura/baseDatos/mongoose';
import { log, logError } from '../src/infraestructura/logging/logger';
import { crearAlmacenPlantillasMongo } from '../src/modulos/modulo_plantillas/almacenPlantillasMongo';
import { sembrarConConexion, sembrarPlantillas } from '../src/modulos/modulo_plantillas/sembrarPlantillas';
import { crearRegistroClasesMongo } from '../src/modulos/modulo_registro/registroClasesMongo';

const archivoDefiniciones = path.resolve(__dirname, '..', 'datos', 'plantillasExamen.json');

async function main() {
  if (!configuracion.mongoUri) {
    throw new Error('MONGODB_URI es requerido para sembrar plantillas');
  }
  const resumen = await sembrarConConexion(
    { conectar: conectarBaseDatos, desconectar: desconectarBaseDatos },
    async () => {
      const contenido = await readFile(archivoDefiniciones, 'utf8');
      return sembrarPlantillas(
        { almacen: crearAlmacenPlantillasMongo(), registro: crearRegistroClasesMongo() },
        JSON.parse(contenido)
      );
    }
  );
  log('system', 'Siembra de plantillas terminada', resumen);
}

main().catch((error) => {
  logError('Fallo la siembra de plantillas', error);
  process.exitCode = 1;
});
