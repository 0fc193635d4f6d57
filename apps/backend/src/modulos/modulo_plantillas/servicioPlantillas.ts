/**
 * Lectura de plantillas de examen.
 */
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import { esquemaObjectId } from '../../compartido/validaciones/esquemas';
import type { AlmacenPlantillas, PlantillaConItems } from './almacenPlantillas';

export async function obtenerPlantillaPorLicencia(
  almacen: AlmacenPlantillas,
  licenciaId: string
): Promise<PlantillaConItems> {
  const id = esquemaObjectId.safeParse(licenciaId);
  if (!id.success) {
    throw new ErrorAplicacion('DATOS_INVALIDOS', 'licenciaId invalido', 400);
  }

  const plantilla = await almacen.obtenerPorLicencia(id.data);
  if (!plantilla) {
    throw new ErrorAplicacion('PLANTILLA_NO_ENCONTRADA', 'No hay plantilla de examen para esta licencia', 404);
  }
  return plantilla;
}
