/**
 * Controlador de evaluaciones de clase.
 */
import type { Response } from 'express';
import { validarDatos } from '../../compartido/validaciones/validar';
import { obtenerIdentidad, type SolicitudAutenticada } from '../modulo_autenticacion/middlewareAutenticacion';
import type { ServicioEvaluaciones, SolicitudEvaluacion } from './servicioEvaluaciones';
import type { ServicioHistorial } from './servicioHistorial';
import { esquemaConsultaHistorial } from './validacionesEvaluaciones';

export function crearControladorEvaluaciones(servicios: {
  evaluaciones: ServicioEvaluaciones;
  historial: ServicioHistorial;
}) {
  return {
    async enviarEvaluacion(req: SolicitudAutenticada, res: Response) {
      const identidad = obtenerIdentidad(req);
      const solicitud: SolicitudEvaluacion = req.body;
      const creada = await servicios.evaluaciones.enviar(identidad, String(req.params.claseId), solicitud);
      res.status(201).location(`/api/evaluaciones/${creada.id}`).json(creada);
    },

    async obtenerEvaluacion(req: SolicitudAutenticada, res: Response) {
      const identidad = obtenerIdentidad(req);
      const evaluacion = await servicios.evaluaciones.obtener(identidad, String(req.params.evaluacionId));
      res.json({ evaluacion });
    },

    async listarHistorialAlumno(req: SolicitudAutenticada, res: Response) {
      const identidad = obtenerIdentidad(req);
      // En Express 5 `req.query` es de solo lectura; se valida aqui.
      const consulta = validarDatos(esquemaConsultaHistorial, req.query, 'VALIDACION', 'Consulta invalida');
      const pagina = await servicios.historial.listar(identidad, String(req.params.alumnoId), consulta);
      res.json(pagina);
    }
  };
}
