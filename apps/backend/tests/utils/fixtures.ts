import type { IdentidadUsuario } from '../../src/compartido/tipos/dominio';
import type { UsuarioRegistrado } from '../../src/modulos/modulo_registro/registroClases';
import { crearEscenario, nuevoId } from './memoria';

export function identidadDe(usuario: Pick<UsuarioRegistrado, 'id' | 'rol' | 'escuelaId'>): IdentidadUsuario {
  return { usuarioId: usuario.id, rol: usuario.rol, escuelaId: usuario.escuelaId };
}

/**
 * Escuela con licencia B, plantilla de 21 puntos (items de 3, 5 y 2 puntos), un instructor,
 * un alumno y el expediente que los une.
 */
export async function prepararEscuela() {
  const escenario = crearEscenario();
  const escuelaId = nuevoId();

  const licencia = escenario.agregarLicencia('B');
  const plantilla = await escenario.plantillas.almacen.crear({
    licenciaId: licencia.id,
    puntosMaximos: 21,
    items: [
      { descripcion: 'Arranque y detencion correctos', puntosPenalizacion: 3, orden: 1 },
      { descripcion: 'Respeto de las reglas de circulacion', puntosPenalizacion: 5, orden: 2 },
      { descripcion: 'Uso de direccionales', puntosPenalizacion: 2, orden: 3 }
    ]
  });
  const [w3, w5, w2] = plantilla.items;

  const instructor = escenario.agregarUsuario('instructor', { nombres: 'Marta', apellidos: 'Ruiz', escuelaId });
  const alumno = escenario.agregarUsuario('alumno', { nombres: 'Luis', apellidos: 'Paz', escuelaId });
  const expediente = escenario.agregarExpediente({
    alumnoId: alumno.id,
    instructorId: instructor.id,
    licenciaId: licencia.id
  });

  return { ...escenario, escuelaId, licencia, plantilla, items: { w3, w5, w2 }, instructor, alumno, expediente };
}

export type Escuela = Awaited<ReturnType<typeof prepararEscuela>>;
