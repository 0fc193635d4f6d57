import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { crearApp } from '../../src/app';
import { identidadDe, prepararEscuela, type Escuela } from '../utils/fixtures';
import { nuevoId } from '../utils/memoria';
import { cabeceraAuth } from '../utils/token';

describe('envio de evaluacion', () => {
  let escuela: Escuela;
  let claseId: string;

  beforeEach(async () => {
    escuela = await prepararEscuela();
    claseId = escuela.agregarClase(escuela.expediente.id, '2025-03-10').id;
  });

  function enviar(cuerpo: object, identidad = identidadDe(escuela.instructor), clase = claseId) {
    return request(crearApp(escuela.dependencias))
      .post(`/api/clases/${clase}/evaluaciones`)
      .set(cabeceraAuth(identidad))
      .send(cuerpo);
  }

  it('registra la evaluacion y calcula 11 puntos (OK)', async () => {
    const { w3, w5 } = escuela.items;
    const respuesta = await enviar({
      errores: [
        { itemId: w3.id, cantidad: 2 },
        { itemId: w5.id, cantidad: 1 }
      ]
    }).expect(201);

    expect(respuesta.body).toEqual({
      id: expect.any(String),
      totalPuntos: 11,
      puntosMaximos: 21,
      resultado: 'OK'
    });
    expect(respuesta.headers.location).toBe(`/api/evaluaciones/${respuesta.body.id}`);

    const guardada = escuela.evaluaciones.evaluaciones.get(respuesta.body.id);
    expect(guardada).toMatchObject({
      claseId,
      plantillaId: escuela.plantilla.id,
      totalPuntos: 11,
      resultado: 'OK',
      errores: [
        { itemId: w3.id, cantidad: 2 },
        { itemId: w5.id, cantidad: 1 }
      ]
    });
    expect(guardada?.finalizadoEn).toEqual(new Date('2025-03-10T12:00:00.000Z'));
    expect(guardada?.creadoEn).toEqual(guardada?.finalizadoEn);
  });

  it('25 puntos sobre 21 reprueba', async () => {
    const respuesta = await enviar({ errores: [{ itemId: escuela.items.w5.id, cantidad: 5 }] }).expect(201);

    expect(respuesta.body).toMatchObject({ totalPuntos: 25, puntosMaximos: 21, resultado: 'FAILED' });
  });

  it('sin errores el total es 0 y aprueba', async () => {
    const respuesta = await enviar({ errores: [] }).expect(201);

    expect(respuesta.body).toMatchObject({ totalPuntos: 0, resultado: 'OK' });
  });

  it('acepta un cuerpo vacio como lista sin errores', async () => {
    const respuesta = await enviar({}).expect(201);

    expect(respuesta.body.totalPuntos).toBe(0);
  });

  it('fusiona items repetidos y descarta conteos en cero', async () => {
    const { w2, w3 } = escuela.items;
    const respuesta = await enviar({
      errores: [
        { itemId: w2.id, cantidad: 1 },
        { itemId: w3.id, cantidad: 0 },
        { itemId: w2.id, cantidad: 2 }
      ]
    }).expect(201);

    expect(respuesta.body.totalPuntos).toBe(6);
    expect(escuela.evaluaciones.evaluaciones.get(respuesta.body.id)?.errores).toEqual([{ itemId: w2.id, cantidad: 3 }]);
  });

  it('rechaza items ajenos a la plantilla sin guardar nada', async () => {
    const ajeno = nuevoId();
    const respuesta = await enviar({
      errores: [
        { itemId: escuela.items.w3.id, cantidad: 1 },
        { itemId: ajeno, cantidad: 1 }
      ]
    }).expect(400);

    expect(respuesta.body.error).toEqual({
      codigo: 'ITEM_NO_PERTENECE_A_PLANTILLA',
      mensaje: 'Hay items que no pertenecen a la plantilla de examen',
      detalles: { itemIds: [ajeno] }
    });
    expect(escuela.evaluaciones.evaluaciones.size).toBe(0);
  });

  it('rechaza un segundo envio para la misma clase y conserva el primero', async () => {
    const primera = await enviar({ errores: [{ itemId: escuela.items.w3.id, cantidad: 1 }] }).expect(201);
    const respuesta = await enviar({ errores: [{ itemId: escuela.items.w5.id, cantidad: 5 }] }).expect(409);

    expect(respuesta.body.error.codigo).toBe('EVALUACION_DUPLICADA');
    expect(escuela.evaluaciones.evaluaciones.size).toBe(1);
    expect(escuela.evaluaciones.evaluaciones.get(primera.body.id)).toMatchObject({ totalPuntos: 3, resultado: 'OK' });
  });

  it('de dos envios simultaneos solo uno se registra', async () => {
    const cuerpo = { errores: [{ itemId: escuela.items.w3.id, cantidad: 1 }] };
    const respuestas = await Promise.all([enviar(cuerpo), enviar(cuerpo)]);

    expect(respuestas.map((respuesta) => respuesta.status).sort()).toEqual([201, 409]);
    expect(escuela.evaluaciones.evaluaciones.size).toBe(1);
  });

  it('un instructor no asignado recibe 403', async () => {
    const otro = escuela.agregarUsuario('instructor', { escuelaId: escuela.escuelaId });
    const respuesta = await enviar({ errores: [] }, identidadDe(otro)).expect(403);

    expect(respuesta.body.error.codigo).toBe('SIN_ACCESO');
    expect(escuela.evaluaciones.evaluaciones.size).toBe(0);
  });

  it('alumnos y administradores no pueden enviar', async () => {
    await enviar({ errores: [] }, identidadDe(escuela.alumno)).expect(403);
    const admin = escuela.agregarUsuario('admin_escuela', { escuelaId: escuela.escuelaId });
    await enviar({ errores: [] }, identidadDe(admin)).expect(403);
  });

  it('la clase inexistente responde 404 antes que el permiso', async () => {
    const otro = escuela.agregarUsuario('instructor');
    const respuesta = await enviar({ errores: [] }, identidadDe(otro), nuevoId()).expect(404);

    expect(respuesta.body.error.codigo).toBe('CLASE_NO_ENCONTRADA');
  });

  it('una clase sin expediente responde 404', async () => {
    const suelta = escuela.agregarClase(null, '2025-03-11');
    const respuesta = await enviar({ errores: [] }, undefined, suelta.id).expect(404);

    expect(respuesta.body.error.codigo).toBe('EXPEDIENTE_NO_ENCONTRADO');
  });

  it('un expediente sin licencia responde LICENCIA_NO_ASIGNADA', async () => {
    const expediente = escuela.agregarExpediente({
      alumnoId: escuela.alumno.id,
      instructorId: escuela.instructor.id,
      licenciaId: null
    });
    const clase = escuela.agregarClase(expediente.id, '2025-03-12');
    const respuesta = await enviar({ errores: [] }, undefined, clase.id).expect(404);

    expect(respuesta.body.error.codigo).toBe('LICENCIA_NO_ASIGNADA');
  });

  it('una licencia sin plantilla responde PLANTILLA_NO_ENCONTRADA', async () => {
    const licencia = escuela.agregarLicencia('C');
    const expediente = escuela.agregarExpediente({
      alumnoId: escuela.alumno.id,
      instructorId: escuela.instructor.id,
      licenciaId: licencia.id
    });
    const clase = escuela.agregarClase(expediente.id, '2025-03-12');
    const respuesta = await enviar({ errores: [] }, undefined, clase.id).expect(404);

    expect(respuesta.body.error.codigo).toBe('PLANTILLA_NO_ENCONTRADA');
  });

  it('un claseId mal formado responde DATOS_INVALIDOS', async () => {
    const respuesta = await enviar({ errores: [] }, undefined, 'clase-1').expect(400);

    expect(respuesta.body.error.codigo).toBe('DATOS_INVALIDOS');
  });

  it('acepta puntosMaximos igual al de la plantilla', async () => {
    await enviar({ errores: [], puntosMaximos: 21 }).expect(201);
  });

  it('rechaza puntosMaximos distinto al de la plantilla', async () => {
    const respuesta = await enviar({ errores: [], puntosMaximos: 30 }).expect(400);

    expect(respuesta.body.error).toMatchObject({
      codigo: 'PUNTOS_MAXIMOS_INCONSISTENTES',
      detalles: { esperado: 21, recibido: 30 }
    });
    expect(escuela.evaluaciones.evaluaciones.size).toBe(0);
  });

  it('valida la forma del cuerpo', async () => {
    const negativo = await enviar({ errores: [{ itemId: escuela.items.w3.id, cantidad: -1 }] }).expect(400);
    expect(negativo.body.error.codigo).toBe('VALIDACION');

    const extra = await enviar({ errores: [], comentario: 'x' }).expect(400);
    expect(extra.body.error.codigo).toBe('VALIDACION');

    const fraccion = await enviar({ errores: [{ itemId: escuela.items.w3.id, cantidad: 1.5 }] }).expect(400);
    expect(fraccion.body.error.codigo).toBe('VALIDACION');
  });

  it('rechaza conteos por encima del tope sin guardar nada', async () => {
    const { w5 } = escuela.items;

    const enorme = await enviar({ errores: [{ itemId: w5.id, cantidad: 1e308 }] }).expect(400);
    expect(enorme.body.error.codigo).toBe('VALIDACION');

    const excedido = await enviar({ errores: [{ itemId: w5.id, cantidad: 1001 }] }).expect(400);
    expect(excedido.body.error.codigo).toBe('VALIDACION');

    expect(escuela.evaluaciones.evaluaciones.size).toBe(0);
  });

  it('acepta el tope de 1000 por entrada', async () => {
    const respuesta = await enviar({ errores: [{ itemId: escuela.items.w2.id, cantidad: 1000 }] }).expect(201);

    expect(respuesta.body).toMatchObject({ totalPuntos: 2000, puntosMaximos: 21, resultado: 'FAILED' });
  });
});
