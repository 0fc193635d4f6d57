/**
 * Rutas de plantillas de examen.
 */
import { Router } from 'express';
import { validarParametros } from '../../compartido/validaciones/validar';
import { requerirAutenticacion } from '../modulo_autenticacion/middlewareAutenticacion';
import type { AlmacenPlantillas } from './almacenPlantillas';
import { crearControladorPlantillas } from './controladorPlantillas';
import { esquemaParametrosLicencia } from './validacionesPlantillas';

export function crearRutasPlantillas(almacen: AlmacenPlantillas) {
  const router = Router();
  const controlador = crearControladorPlantillas(almacen);

  router.get(
    '/licencia/:licenciaId',
    requerirAutenticacion,
    validarParametros(esquemaParametrosLicencia),
    controlador.obtenerPorLicencia
  );

  return router;
}
