/**
 * Error estandar para respuestas controladas del API.
 *
 * `codigo` es legible por maquina (parte del contrato publico); `mensaje` es para personas.
 */
export type CodigoError =
  | 'VALIDACION'
  | 'DATOS_INVALIDOS'
  | 'JSON_INVALIDO'
  | 'ITEM_NO_PERTENECE_A_PLANTILLA'
  | 'PUNTOS_MAXIMOS_INCONSISTENTES'
  | 'PUNTAJE_FUERA_DE_RANGO'
  | 'NO_AUTORIZADO'
  | 'TOKEN_INVALIDO'
  | 'SIN_ACCESO'
  | 'CLASE_NO_ENCONTRADA'
  | 'EXPEDIENTE_NO_ENCONTRADO'
  | 'LICENCIA_NO_ASIGNADA'
  | 'PLANTILLA_NO_ENCONTRADA'
  | 'EVALUACION_NO_ENCONTRADA'
  | 'ALUMNO_NO_ENCONTRADO'
  | 'RUTA_NO_ENCONTRADA'
  | 'EVALUACION_DUPLICADA'
  | 'PAYLOAD_DEMASIADO_GRANDE'
  | 'ERROR_INTERNO';

export class ErrorAplicacion extends Error {
  readonly codigo: CodigoError;
  readonly estadoHttp: number;
  readonly detalles?: unknown;

  constructor(codigo: CodigoError, mensaje: string, estadoHttp = 400, detalles?: unknown) {
    super(mensaje);
    this.name = 'ErrorAplicacion';
    this.codigo = codigo;
    this.estadoHttp = estadoHttp;
    this.detalles = detalles;
  }
}
