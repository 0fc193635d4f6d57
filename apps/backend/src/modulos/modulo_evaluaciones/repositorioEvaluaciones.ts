/**
 * Contrato de persistencia de evaluaciones.
 */
import type { ResultadoEvaluacion } from '../../compartido/tipos/dominio';

export type ErrorCometido = {
  itemId: string;
  cantidad: number;
};

export type EvaluacionRegistrada = {
  id: string;
  claseId: string;
  plantillaId: string;
  errores: ErrorCometido[];
  totalPuntos: number | null;
  resultado: ResultadoEvaluacion | null;
  creadoEn: Date;
  finalizadoEn: Date | null;
};

/** Una evaluacion nueva siempre llega finalizada. */
export type NuevaEvaluacion = {
  claseId: string;
  plantillaId: string;
  errores: ErrorCometido[];
  totalPuntos: number;
  resultado: ResultadoEvaluacion;
  creadoEn: Date;
  finalizadoEn: Date;
};

export type FiltroHistorial = {
  alumnoId: string;
  desde: Date | null;
  hasta: Date | null;
  pagina: number;
  tamanoPagina: number;
};

export type FilaHistorial = {
  id: string;
  fechaClase: Date;
  totalPuntos: number | null;
  puntosMaximos: number | null;
  resultado: ResultadoEvaluacion | null;
};

export type PaginaHistorial = {
  total: number;
  filas: FilaHistorial[];
};

export interface RepositorioEvaluaciones {
  /**
   * Inserta la evaluacion. Si ya existe una para la clase lanza `EVALUACION_DUPLICADA` (409)
   * y no toca la existente.
   */
  insertar(nueva: NuevaEvaluacion): Promise<EvaluacionRegistrada>;
  obtenerPorId(evaluacionId: string): Promise<EvaluacionRegistrada | null>;
  /** Ordenado por fecha de la clase descendente y, en empate, por id descendente. */
  listarHistorialAlumno(filtro: FiltroHistorial): Promise<PaginaHistorial>;
}
