/**
 * Registro central de rutas del API de evaluaciones.
 */
import { Router } from 'express';
import rutasSalud from './compartido/salud/rutasSalud';
import { rutaNoEncontrada } from './compartido/errores/manejadorErrores';
import type { Dependencias } from './dependencias';
import { crearRutasEvaluaciones } from './modulos/modulo_evaluaciones/rutasEvaluaciones';
import { crearRutasPlantillas } from './modulos/modulo_plantillas/rutasPlantillas';

export function crearRouterApi(dependencias: Dependencias) {
  const router = Router();

  router.use('/salud', rutasSalud);
  router.use('/plantillas', crearRutasPlantillas(dependencias.plantillas));
  router.use('/', crearRutasEvaluaciones(dependencias));
  router.use(rutaNoEncontrada);

  return router;
}
