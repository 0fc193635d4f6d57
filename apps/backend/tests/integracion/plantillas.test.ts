import request from 'supertest';
import { beforeEach, describe, expect, it } from 'vitest';
import { crearApp } from '../../src/app';
import { identidadDe, prepararEscuela, type Escuela } from '../utils/fixtures';
import { nuevoId } from '../utils/memoria';
import { cabeceraAuth } from '../utils/token';

describe('plantillas por licencia', () => {
  let escuela: Escuela;

  beforeEach(async () => {
    escuela = await prepararEscuela();
  });

  it('devuelve la plantilla con sus items ordenados', async () => {
    const app = crearApp(escuela.dependencias);
    const respuesta = await request(app)
      .get(`/api/plantillas/licencia/${escuela.licencia.id}`)
      .set(cabeceraAuth(identidadDe(escuela.alumno)))
      .expect(200);

    expect(respuesta.body.plantilla).toEqual({
      id: escuela.plantilla.id,
      licenciaId: escuela.licencia.id,
      puntosMaximos: 21,
      items: [
        { id: escuela.items.w3.id, descripcion: 'Arranque y detencion correctos', puntosPenalizacion: 3, orden: 1 },
        { id: escuela.items.w5.id, descripcion: 'Respeto de las reglas de circulacion', puntosPenalizacion: 5, orden: 2 },
        { id: escuela.items.w2.id, descripcion: 'Uso de direccionales', puntosPenalizacion: 2, orden: 3 }
      ]
    });
  });

  it('responde 404 si la licencia no tiene plantilla', async () => {
    const app = crearApp(escuela.dependencias);
    const respuesta = await request(app)
      .get(`/api/plantillas/licencia/${nuevoId()}`)
      .set(cabeceraAuth(identidadDe(escuela.instructor)))
      .expect(404);

    expect(respuesta.body.error.codigo).toBe('PLANTILLA_NO_ENCONTRADA');
  });

  it('responde 400 con un id mal formado', async () => {
    const app = crearApp(escuela.dependencias);
    const respuesta = await request(app)
      .get('/api/plantillas/licencia/xyz')
      .set(cabeceraAuth(identidadDe(escuela.instructor)))
      .expect(400);

    expect(respuesta.body.error.codigo).toBe('DATOS_INVALIDOS');
  });

  it('requiere sesion', async () => {
    const app = crearApp(escuela.dependencias);
    await request(app).get(`/api/plantillas/licencia/${escuela.licencia.id}`).expect(401);
  });
});
