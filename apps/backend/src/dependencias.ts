/**
 * Dependencias de datos del API.
 *
 * Produccion usa las implementaciones sobre MongoDB; las pruebas inyectan dobles en memoria.
 */
import type { AlmacenPlantillas } from './modulos/modulo_plantillas/almacenPlantillas';
import { crearAlmacenPlantillasMongo } from './modulos/modulo_plantillas/almacenPlantillasMongo';
import type { RepositorioEvaluaciones } from './modulos/modulo_evaluaciones/repositorioEvaluaciones';
import { crearRepositorioEvaluacionesMongo } from './modulos/modulo_evaluaciones/repositorioEvaluacionesMongo';
import type { RegistroClases } from './modulos/modulo_registro/registroClases';
import { crearRegistroClasesMongo } from './modulos/modulo_registro/registroClasesMongo';

export type Dependencias = {
  plantillas: AlmacenPlantillas;
  registro: RegistroClases;
  evaluaciones: RepositorioEvaluaciones;
  ahora: () => Date;
};

export function crearDependencias(parciales: Partial<Dependencias> = {}): Dependencias {
  return {
    plantillas: parciales.plantillas ?? crearAlmacenPlantillasMongo(),
    registro: parciales.registro ?? crearRegistroClasesMongo(),
    evaluaciones: parciales.evaluaciones ?? crearRepositorioEvaluacionesMongo(),
    ahora: parciales.ahora ?? (() => new Date())
  };
}
