/**
 * Registro y consulta de evaluaciones de clase.
 *
 * Orden de comprobaciones en el envio: existencia de la cadena clase -> expediente -> licencia ->
 * plantilla (404), despues acceso (403), despues contenido (400). Todo antes del unico insert.
 */
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { IdentidadUsuario, ResultadoEvaluacion } from '../../compartido/tipos/dominio';
import { esquemaObjectId } from '../../compartido/validaciones/esquemas';
import { log } from '../../infraestructura/logging/logger';
import type { Dependencias } from '../../dependencias';
import { obtenerPlantillaPorLicencia } from '../modulo_plantillas/servicioPlantillas';
import { nombreCompleto, type ExpedienteRegistrado, type RegistroClases } from '../modulo_registro/registroClases';
import { contextoDeExpediente, exigirAcceso } from './politicaAcceso';
import type { ErrorCometido } from './repositorioEvaluaciones';
import { calcularPuntaje } from './servicioPuntaje';

export type SolicitudEvaluacion = {
  errores: ErrorCometido[];
  puntosMaximos?: number;
};

export type EvaluacionCreada = {
  id: string;
  totalPuntos: number;
  puntosMaximos: number;
  resultado: ResultadoEvaluacion;
};

export type DetalleEvaluacion = {
  id: string;
  claseId: string;
  fechaClase: string;
  horaInicio: string;
  horaFin: string;
  alumnoNombre: string;
  instructorNombre: string;
  totalPuntos: number | null;
  puntosMaximos: number | null;
  resultado: ResultadoEvaluacion | null;
  creadoEn: Date;
  finalizadoEn: Date | null;
  errores: Array<{ itemId: string; descripcion: string; cantidad: number; puntosPenalizacion: number }>;
};

export function exigirId(valor: string, campo: string) {
  const id = esquemaObjectId.safeParse(valor);
  if (!id.success) {
    throw new ErrorAplicacion('DATOS_INVALIDOS', `${campo} invalido`, 400);
  }
  return id.data;
}

export function fechaCalendario(fecha: Date) {
  return fecha.toISOString().slice(0, 10);
}

async function resolverClaseConExpediente(registro: RegistroClases, claseId: string) {
  const clase = await registro.obtenerClase(claseId);
  if (!clase) {
    throw new ErrorAplicacion('CLASE_NO_ENCONTRADA', 'Clase no encontrada', 404);
  }
  const expediente: ExpedienteRegistrado | null = clase.expedienteId
    ? await registro.obtenerExpediente(clase.expedienteId)
    : null;
  if (!expediente) {
    throw new ErrorAplicacion('EXPEDIENTE_NO_ENCONTRADO', 'La clase no tiene expediente', 404);
  }
  return { clase, expediente };
}

export function crearServicioEvaluaciones({ plantillas, registro, evaluaciones, ahora }: Dependencias) {
  return {
    async enviar(
      identidad: IdentidadUsuario,
      claseIdCrudo: string,
      solicitud: SolicitudEvaluacion
    ): Promise<EvaluacionCreada> {
      const claseId = exigirId(claseIdCrudo, 'claseId');
      const { expediente } = await resolverClaseConExpediente(registro, claseId);

      if (!expediente.licenciaId) {
        throw new ErrorAplicacion('LICENCIA_NO_ASIGNADA', 'El expediente no tiene licencia asignada', 404);
      }
      const plantilla = await obtenerPlantillaPorLicencia(plantillas, expediente.licenciaId);

      const alumno = await registro.obtenerUsuario(expediente.alumnoId);
      exigirAcceso('enviar', identidad, contextoDeExpediente(expediente, alumno));

      const puntaje = calcularPuntaje(plantilla, solicitud.errores);
      if (solicitud.puntosMaximos !== undefined && solicitud.puntosMaximos !== plantilla.puntosMaximos) {
        throw new ErrorAplicacion(
          'PUNTOS_MAXIMOS_INCONSISTENTES',
          'puntosMaximos no coincide con la plantilla de examen',
          400,
          { esperado: plantilla.puntosMaximos, recibido: solicitud.puntosMaximos }
        );
      }

      const momento = ahora();
      const evaluacion = await evaluaciones.insertar({
        claseId,
        plantillaId: plantilla.id,
        errores: puntaje.errores,
        totalPuntos: puntaje.totalPuntos,
        resultado: puntaje.resultado,
        creadoEn: momento,
        finalizadoEn: momento
      });

      log('info', 'Evaluacion registrada', {
        evaluacionId: evaluacion.id,
        claseId,
        resultado: puntaje.resultado
      });

      return {
        id: evaluacion.id,
        totalPuntos: puntaje.totalPuntos,
        puntosMaximos: plantilla.puntosMaximos,
        resultado: puntaje.resultado
      };
    },

    async obtener(identidad: IdentidadUsuario, evaluacionIdCrudo: string): Promise<DetalleEvaluacion> {
      const evaluacionId = exigirId(evaluacionIdCrudo, 'evaluacionId');
      const evaluacion = await evaluaciones.obtenerPorId(evaluacionId);
      if (!evaluacion) {
        throw new ErrorAplicacion('EVALUACION_NO_ENCONTRADA', 'Evaluacion no encontrada', 404);
      }

      const { clase, expediente } = await resolverClaseConExpediente(registro, evaluacion.claseId);
      const alumno = await registro.obtenerUsuario(expediente.alumnoId);
      exigirAcceso('obtener', identidad, contextoDeExpediente(expediente, alumno));

      const [plantilla, instructor] = await Promise.all([
        plantillas.obtenerPorId(evaluacion.plantillaId),
        expediente.instructorId ? registro.obtenerUsuario(expediente.instructorId) : Promise.resolve(null)
      ]);

      // Un item que ya no se resuelve se omite del desglose; el total guardado no cambia.
      const items = new Map((plantilla?.items ?? []).map((item) => [item.id, item]));
      const desglose = evaluacion.errores.flatMap((error) => {
        const item = items.get(error.itemId);
        return item ? [{ error, item }] : [];
      });
      desglose.sort((a, b) => a.item.orden - b.item.orden);

      return {
        id: evaluacion.id,
        claseId: clase.id,
        fechaClase: fechaCalendario(clase.fecha),
        horaInicio: clase.horaInicio,
        horaFin: clase.horaFin,
        alumnoNombre: nombreCompleto(alumno),
        instructorNombre: nombreCompleto(instructor),
        totalPuntos: evaluacion.totalPuntos,
        puntosMaximos: plantilla?.puntosMaximos ?? null,
        resultado: evaluacion.resultado,
        creadoEn: evaluacion.creadoEn,
        finalizadoEn: evaluacion.finalizadoEn,
        errores: desglose.map(({ error, item }) => ({
          itemId: item.id,
          descripcion: item.descripcion,
          cantidad: error.cantidad,
          puntosPenalizacion: item.puntosPenalizacion
        }))
      };
    }
  };
}

export type ServicioEvaluaciones = ReturnType<typeof crearServicioEvaluaciones>;
