/**
 * Rutas de evaluaciones de clase.
 *
 * Se montan en la raiz del API porque cuelgan de tres recursos distintos
 * (clases, evaluaciones y alumnos).
 */
import { Router } from 'express';
import { validarCuerpo, validarParametros } from '../../compartido/validaciones/validar';
import type { Dependencias } from '../../dependencias';
import { requerirAutenticacion, requerirRol } from '../modulo_autenticacion/middlewareAutenticacion';
import { crearControladorEvaluaciones } from './controladorEvaluaciones';
import { crearServicioEvaluaciones } from './servicioEvaluaciones';
import { crearServicioHistorial } from './servicioHistorial';
import {
  esquemaEnviarEvaluacion,
  esquemaParametrosAlumno,
  esquemaParametrosClase,
  esquemaParametrosEvaluacion
} from './validacionesEvaluaciones';

export function crearRutasEvaluaciones(dependencias: Dependencias) {
  const router = Router();
  const controlador = crearControladorEvaluaciones({
    evaluaciones: crearServicioEvaluaciones(dependencias),
    historial: crearServicioHistorial(dependencias)
  });
  const lectores = requerirRol('instructor', 'alumno', 'admin_escuela');

  router.post(
    '/clases/:claseId/evaluaciones',
    requerirAutenticacion,
    requerirRol('instructor'),
    validarParametros(esquemaParametrosClase),
    validarCuerpo(esquemaEnviarEvaluacion, { strict: true }),
    controlador.enviarEvaluacion
  );

  router.get(
    '/evaluaciones/:evaluacionId',
    requerirAutenticacion,
    lectores,
    validarParametros(esquemaParametrosEvaluacion),
    controlador.obtenerEvaluacion
  );

  router.get(
    '/alumnos/:alumnoId/evaluaciones',
    requerirAutenticacion,
    lectores,
    validarParametros(esquemaParametrosAlumno),
    controlador.listarHistorialAlumno
  );

  return router;
}
