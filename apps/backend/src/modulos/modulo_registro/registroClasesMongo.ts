/**
 * Implementacion del registro de clases sobre las colecciones de MongoDB.
 */
import { Types } from 'mongoose';
import { Clase } from './modeloClase';
import { Expediente } from './modeloExpediente';
import { Licencia } from './modeloLicencia';
import { Usuario } from './modeloUsuario';
import type {
  ClaseRegistrada,
  ExpedienteRegistrado,
  LicenciaRegistrada,
  RegistroClases,
  UsuarioRegistrado
} from './registroClases';

function idONulo(valor: Types.ObjectId | null | undefined) {
  return valor ? valor.toHexString() : null;
}

export function crearRegistroClasesMongo(): RegistroClases {
  return {
    async obtenerClase(claseId): Promise<ClaseRegistrada | null> {
      const clase = await Clase.findById(claseId).lean();
      if (!clase) return null;
      return {
        id: clase._id.toHexString(),
        fecha: clase.fecha,
        horaInicio: clase.horaInicio,
        horaFin: clase.horaFin,
        expedienteId: idONulo(clase.expedienteId)
      };
    },

    async obtenerExpediente(expedienteId): Promise<ExpedienteRegistrado | null> {
      const expediente = await Expediente.findById(expedienteId).lean();
      if (!expediente) return null;
      return {
        id: expediente._id.toHexString(),
        alumnoId: expediente.alumnoId.toHexString(),
        instructorId: idONulo(expediente.instructorId),
        licenciaId: idONulo(expediente.licenciaId)
      };
    },

    async obtenerUsuario(usuarioId): Promise<UsuarioRegistrado | null> {
      const usuario = await Usuario.findById(usuarioId).lean();
      if (!usuario) return null;
      return {
        id: usuario._id.toHexString(),
        nombres: usuario.nombres,
        apellidos: usuario.apellidos,
        rol: usuario.rol,
        escuelaId: idONulo(usuario.escuelaId)
      };
    },

    async listarInstructoresDeAlumno(alumnoId) {
      const ids = await Expediente.distinct('instructorId', {
        alumnoId: new Types.ObjectId(alumnoId),
        instructorId: { $ne: null }
      });
      return ids.map((id) => String(id));
    },

    async buscarLicenciaPorTipo(tipo): Promise<LicenciaRegistrada | null> {
      const licencia = await Licencia.findOne({ tipo: tipo.trim().toUpperCase() }).lean();
      if (!licencia) return null;
      return { id: licencia._id.toHexString(), tipo: licencia.tipo };
    }
  };
}
