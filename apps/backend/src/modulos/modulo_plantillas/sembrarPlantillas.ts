/**
 * Siembra idempotente de las plantillas de examen.
 *
 * Se ejecuta una vez por despliegue (`npm run sembrar`), nunca desde un request.
 * Una licencia que ya tiene plantilla no se toca: las plantillas son inmutables y las
 * evaluaciones existentes dependen de sus items.
 */
import { log } from '../../infraestructura/logging/logger';
import type { RegistroClases } from '../modulo_registro/registroClases';
import type { AlmacenPlantillas, NuevaPlantilla } from './almacenPlantillas';
import { esquemaDefinicionesPlantillas, type DefinicionPlantilla } from './validacionesPlantillas';

export type ResumenSiembra = {
  creadas: string[];
  omitidas: string[];
  licenciasFaltantes: string[];
};

type DependenciasSiembra = {
  almacen: AlmacenPlantillas;
  registro: Pick<RegistroClases, 'buscarLicenciaPorTipo'>;
};

/**
 * Ordena por `orden` declarado (los items sin orden conservan su posicion) y renumera 1..n.
 */
export function normalizarItems(items: DefinicionPlantilla['items']): NuevaPlantilla['items'] {
  return items
    .map((item, indice) => ({ item, clave: item.orden ?? indice + 1, indice }))
    .sort((a, b) => a.clave - b.clave || a.indice - b.indice)
    .map(({ item }, indice) => ({
      descripcion: item.descripcion,
      puntosPenalizacion: item.puntosPenalizacion,
      orden: indice + 1
    }));
}

export async function sembrarPlantillas(
  { almacen, registro }: DependenciasSiembra,
  definiciones: unknown
): Promise<ResumenSiembra> {
  const validas = esquemaDefinicionesPlantillas.parse(definiciones);
  const resumen: ResumenSiembra = { creadas: [], omitidas: [], licenciasFaltantes: [] };

  for (const definicion of validas) {
    const tipo = definicion.tipoLicencia.toUpperCase();
    const licencia = await registro.buscarLicenciaPorTipo(tipo);
    if (!licencia) {
      log('warn', 'Licencia inexistente; se omite su plantilla', { tipoLicencia: tipo });
      resumen.licenciasFaltantes.push(tipo);
      continue;
    }

    const existente = await almacen.obtenerPorLicencia(licencia.id);
    if (existente) {
      resumen.omitidas.push(tipo);
      continue;
    }

    const creada = await almacen.crear({
      licenciaId: licencia.id,
      puntosMaximos: definicion.puntosMaximos,
      items: normalizarItems(definicion.items)
    });
    log('ok', 'Plantilla de examen creada', { tipoLicencia: tipo, plantillaId: creada.id, items: creada.items.length });
    resumen.creadas.push(tipo);
  }

  return resumen;
}

type ConexionSiembra = {
  conectar: () => Promise<void>;
  desconectar: () => Promise<void>;
};

/**
 * Abre la conexion, corre la siembra y siempre cierra la conexion antes de resolver.
 * Un fallo al cerrar rechaza la promesa igual que un fallo de la siembra.
 */
export async function sembrarConConexion(
  { conectar, desconectar }: ConexionSiembra,
  sembrar: () => Promise<ResumenSiembra>
): Promise<ResumenSiembra> {
  try {
    await conectar();
    return await sembrar();
  } finally {
    await desconectar();
  }
}
