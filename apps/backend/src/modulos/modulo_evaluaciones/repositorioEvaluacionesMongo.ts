/**
 * Repositorio de evaluaciones sobre MongoDB.
 */
import { Types } from 'mongoose';
import { ErrorAplicacion } from '../../compartido/errores/errorAplicacion';
import type { ResultadoEvaluacion } from '../../compartido/tipos/dominio';
import { PlantillaExamen } from '../modulo_plantillas/modeloPlantillaExamen';
import { Clase } from '../modulo_registro/modeloClase';
import { Expediente } from '../modulo_registro/modeloExpediente';
import { EvaluacionSesion, type EvaluacionSesionDoc } from './modeloEvaluacion';
import type { EvaluacionRegistrada, RepositorioEvaluaciones } from './repositorioEvaluaciones';

const CODIGO_CLAVE_DUPLICADA = 11000;

type FacetHistorial = {
  total: Array<{ n: number }>;
  filas: Array<{
    _id: Types.ObjectId;
    fechaClase: Date;
    totalPuntos: number | null;
    /** Ausente si la plantilla ya no existe. */
    puntosMaximos?: number;
    resultado: ResultadoEvaluacion | null;
  }>;
};

function esClaveDuplicada(error: unknown) {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === CODIGO_CLAVE_DUPLICADA;
}

function aRegistrada(doc: EvaluacionSesionDoc & { _id: Types.ObjectId }): EvaluacionRegistrada {
  return {
    id: doc._id.toHexString(),
    claseId: doc.claseId.toHexString(),
    plantillaId: doc.plantillaId.toHexString(),
    errores: doc.errores.map((error) => ({ itemId: error.itemId.toHexString(), cantidad: error.cantidad })),
    totalPuntos: doc.totalPuntos,
    resultado: doc.resultado,
    creadoEn: doc.creadoEn,
    finalizadoEn: doc.finalizadoEn
  };
}

function rangoFechas(desde: Date | null, hasta: Date | null) {
  const rango: { $gte?: Date; $lte?: Date } = {};
  if (desde) rango.$gte = desde;
  if (hasta) rango.$lte = hasta;
  return rango;
}

export function crearRepositorioEvaluacionesMongo(): RepositorioEvaluaciones {
  return {
    async insertar(nueva) {
      try {
        const creada = await EvaluacionSesion.create({
          ...nueva,
          claseId: new Types.ObjectId(nueva.claseId),
          plantillaId: new Types.ObjectId(nueva.plantillaId),
          errores: nueva.errores.map((error) => ({ itemId: new Types.ObjectId(error.itemId), cantidad: error.cantidad }))
        });
        return aRegistrada(creada.toObject());
      } catch (error) {
        if (esClaveDuplicada(error)) {
          throw new ErrorAplicacion('EVALUACION_DUPLICADA', 'La clase ya tiene una evaluacion registrada', 409, {
            claseId: nueva.claseId
          });
        }
        throw error;
      }
    },

    async obtenerPorId(evaluacionId) {
      const evaluacion = await EvaluacionSesion.findById(evaluacionId).lean();
      return evaluacion ? aRegistrada(evaluacion) : null;
    },

    async listarHistorialAlumno({ alumnoId, desde, hasta, pagina, tamanoPagina }) {
      const filtroFecha = desde || hasta ? { 'clase.fecha': rangoFechas(desde, hasta) } : {};

      const [resultado] = await EvaluacionSesion.aggregate<FacetHistorial>([
        { $lookup: { from: Clase.collection.name, localField: 'claseId', foreignField: '_id', as: 'clase' } },
        { $unwind: '$clase' },
        {
          $lookup: {
            from: Expediente.collection.name,
            localField: 'clase.expedienteId',
            foreignField: '_id',
            as: 'expediente'
          }
        },
        { $unwind: '$expediente' },
        { $match: { 'expediente.alumnoId': new Types.ObjectId(alumnoId), ...filtroFecha } },
        { $sort: { 'clase.fecha': -1, _id: -1 } },
        {
          $facet: {
            total: [{ $count: 'n' }],
            filas: [
              { $skip: (pagina - 1) * tamanoPagina },
              { $limit: tamanoPagina },
              {
                $lookup: {
                  from: PlantillaExamen.collection.name,
                  localField: 'plantillaId',
                  foreignField: '_id',
                  as: 'plantilla'
                }
              },
              {
                $project: {
                  _id: 1,
                  fechaClase: '$clase.fecha',
                  totalPuntos: 1,
                  resultado: 1,
                  puntosMaximos: { $arrayElemAt: ['$plantilla.puntosMaximos', 0] }
                }
              }
            ]
          }
        }
      ]);

      return {
        total: resultado?.total[0]?.n ?? 0,
        filas: (resultado?.filas ?? []).map((fila) => ({
          id: fila._id.toHexString(),
          fechaClase: fila.fechaClase,
          totalPuntos: fila.totalPuntos,
          puntosMaximos: fila.puntosMaximos ?? null,
          resultado: fila.resultado
        }))
      };
    }
  };
}
