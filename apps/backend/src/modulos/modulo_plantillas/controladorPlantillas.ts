/**
 * Controlador de plantillas de examen (consulta).
 */
import type { Response } from 'express';
import type { SolicitudAutenticada } from '../modulo_autenticacion/middlewareAutenticacion';
import type { AlmacenPlantillas } from './almacenPlantillas';
import { obtenerPlantillaPorLicencia } from './servicioPlantillas';

export function crearControladorPlantillas(almacen: AlmacenPlantillas) {
  return {
    async obtenerPorLicencia(req: SolicitudAutenticada, res: Response) {
      const plantilla = await obtenerPlantillaPorLicencia(almacen, String(req.params.licenciaId));
      res.json({ plantilla });
    }
  };
}
