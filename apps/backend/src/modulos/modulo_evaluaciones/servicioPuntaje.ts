/**
 * Calculo de puntaje de una evaluacion.
 *
 * Cada error cometido suma `cantidad x puntosPenalizacion` del item; el alumno aprueba
 * mientras el total no supere el maximo de la plantilla.
 */
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { ResultadoEvaluacion } from '../../compartido/tipos/dominio';
import type { PlantillaConItems } from '../modulo_plantillas/almacenPlantillas';
import type { ErrorCometido } from './repositorioEvaluaciones';

export type Puntaje = {
  errores: ErrorCometido[];
  totalPuntos: number;
  resultado: ResultadoEvaluacion;
};

/**
 * Suma las repeticiones de un mismo item y descarta los conteos en cero.
 * Conserva el orden en que cada item aparece por primera vez.
 */
export function normalizarErrores(errores: ErrorCometido[]): ErrorCometido[] {
  const porItem = new Map<string, number>();
  for (const { itemId, cantidad } of errores) {
    porItem.set(itemId, (porItem.get(itemId) ?? 0) + cantidad);
  }
  return Array.from(porItem, ([itemId, cantidad]) => ({ itemId, cantidad })).filter((error) => error.cantidad > 0);
}

export function determinarResultado(totalPuntos: number, puntosMaximos: number): ResultadoEvaluacion {
  return totalPuntos <= puntosMaximos ? 'OK' : 'FAILED';
}

export function calcularPuntaje(
  plantilla: Pick<PlantillaConItems, 'items' | 'puntosMaximos'>,
  errores: ErrorCometido[]
): Puntaje {
  const items = new Map(plantilla.items.map((item) => [item.id, item]));

  const ajenos = Array.from(new Set(errores.map((error) => error.itemId).filter((itemId) => !items.has(itemId))));
  if (ajenos.length > 0) {
    throw new ErrorAplicacion(
      'ITEM_NO_PERTENECE_A_PLANTILLA',
      'Hay items que no pertenecen a la plantilla de examen',
      400,
      { itemIds: ajenos }
    );
  }

  const normalizados = normalizarErrores(errores);
  const totalPuntos = normalizados.reduce(
    (suma, error) => suma + error.cantidad * (items.get(error.itemId)?.puntosPenalizacion ?? 0),
    0
  );
  const fueraDeRango = normalizados
    .filter((error) => !Number.isSafeInteger(error.cantidad))
    .map((error) => error.itemId);
  if (fueraDeRango.length > 0 || !Number.isSafeInteger(totalPuntos)) {
    throw new ErrorAplicacion('PUNTAJE_FUERA_DE_RANGO', 'El puntaje excede el rango representable', 400, {
      itemIds: fueraDeRango
    });
  }

  return {
    errores: normalizados,
    totalPuntos,
    resultado: determinarResultado(totalPuntos, plantilla.puntosMaximos)
  };
}
