// Pruebas del middleware de errores.
import express from 'express';
import request from 'supertest';
import { describe, expect, it } from 'vitest';
import { ErrorAplicacion } from '../src/compartido/errores/errorAplicacion';
import { manejadorErrores, rutaNoEncontrada } from '../src/compartido/errores/manejadorErrores';

describe('manejadorErrores', () => {
  const app = express();
  app.use(express.json());

  app.get('/controlado', () => {
    throw new ErrorAplicacion('EVALUACION_DUPLICADA', 'Error controlado', 409, { campo: 'valor' });
  });

  app.get('/inesperado', () => {
    throw new Error('E11000 duplicate key error collection: evaluaciones');
  });

  app.get('/casteo', () => {
    const error = new Error('Cast to ObjectId failed');
    error.name = 'CastError';
    throw error;
  });

  app.post('/eco', (req, res) => {
    res.json(req.body);
  });

  app.use(rutaNoEncontrada);
  app.use(manejadorErrores);

  it('serializa errores de aplicacion con detalles', async () => {
    const respuesta = await request(app).get('/controlado').expect(409);

    expect(respuesta.body).toEqual({
      error: { codigo: 'EVALUACION_DUPLICADA', mensaje: 'Error controlado', detalles: { campo: 'valor' } }
    });
  });

  it('no filtra el mensaje del error original', async () => {
    const respuesta = await request(app).get('/inesperado').expect(500);

    expect(respuesta.body).toEqual({ error: { codigo: 'ERROR_INTERNO', mensaje: 'Error interno' } });
  });

  it('traduce errores de casteo a DATOS_INVALIDOS', async () => {
    const respuesta = await request(app).get('/casteo').expect(400);

    expect(respuesta.body.error.codigo).toBe('DATOS_INVALIDOS');
  });

  it('responde JSON_INVALIDO con un cuerpo mal formado', async () => {
    const respuesta = await request(app)
      .post('/eco')
      .set('Content-Type', 'application/json')
      .send('{"errores": [')
      .expect(400);

    expect(respuesta.body.error.codigo).toBe('JSON_INVALIDO');
  });

  it('responde RUTA_NO_ENCONTRADA para rutas desconocidas', async () => {
    const respuesta = await request(app).get('/no-existe').expect(404);

    expect(respuesta.body.error).toEqual({ codigo: 'RUTA_NO_ENCONTRADA', mensaje: 'Ruta no encontrada: GET /no-existe' });
  });
});
