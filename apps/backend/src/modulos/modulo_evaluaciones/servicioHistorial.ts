/**
 * Historial de evaluaciones de un alumno, paginado.
 */
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { IdentidadUsuario, ResultadoEvaluacion } from '../../compartido/tipos/dominio';
import type { Dependencias } from '../../dependencias';
import { exigirAcceso } from './politicaAcceso';
import { exigirId, fechaCalendario } from './servicioEvaluaciones';

export type ConsultaHistorial = {
  desde?: string;
  hasta?: string;
  pagina: number;
  tamanoPagina: number;
};

export type RespuestaHistorial = {
  pagina: number;
  tamanoPagina: number;
  total: number;
  items: Array<{
    id: string;
    fechaClase: string;
    totalPuntos: number | null;
    puntosMaximos: number | null;
    resultado: ResultadoEvaluacion | null;
  }>;
};

export function crearServicioHistorial({ registro, evaluaciones }: Pick<Dependencias, 'registro' | 'evaluaciones'>) {
  return {
    async listar(
      identidad: IdentidadUsuario,
      alumnoIdCrudo: string,
      consulta: ConsultaHistorial
    ): Promise<RespuestaHistorial> {
      const alumnoId = exigirId(alumnoIdCrudo, 'alumnoId');
      // Las fechas YYYY-MM-DD se comparan bien como texto.
      if (consulta.desde && consulta.hasta && consulta.desde > consulta.hasta) {
        throw new ErrorAplicacion('DATOS_INVALIDOS', 'desde no puede ser posterior a hasta', 400);
      }

      const alumno = await registro.obtenerUsuario(alumnoId);
      if (!alumno || alumno.rol !== 'alumno') {
        throw new ErrorAplicacion('ALUMNO_NO_ENCONTRADO', 'Alumno no encontrado', 404);
      }

      const instructorIds = await registro.listarInstructoresDeAlumno(alumnoId);
      exigirAcceso('historial', identidad, { alumnoId, escuelaId: alumno.escuelaId, instructorIds });

      const { total, filas } = await evaluaciones.listarHistorialAlumno({
        alumnoId,
        desde: consulta.desde ? new Date(`${consulta.desde}T00:00:00.000Z`) : null,
        hasta: consulta.hasta ? new Date(`${consulta.hasta}T23:59:59.999Z`) : null,
        pagina: consulta.pagina,
        tamanoPagina: consulta.tamanoPagina
      });

      return {
        pagina: consulta.pagina,
        tamanoPagina: consulta.tamanoPagina,
        total,
        items: filas.map((fila) => ({
          id: fila.id,
          fechaClase: fechaCalendario(fila.fechaClase),
          totalPuntos: fila.totalPuntos,
          puntosMaximos: fila.puntosMaximos,
          resultado: fila.resultado
        }))
      };
    }
  };
}

export type ServicioHistorial = ReturnType<typeof crearServicioHistorial>;
