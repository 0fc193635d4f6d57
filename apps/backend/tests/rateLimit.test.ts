import request from 'supertest';
import { afterEach, describe, expect, it, vi } from 'vitest';

const anterior = {
  RATE_LIMIT_LIMIT: process.env.RATE_LIMIT_LIMIT,
  RATE_LIMIT_WINDOW_MS: process.env.RATE_LIMIT_WINDOW_MS
};

function restaurar(clave: keyof typeof anterior) {
  const valor = anterior[clave];
  if (valor === undefined) delete process.env[clave];
  else process.env[clave] = valor;
}

describe('rate limit', () => {
  afterEach(() => {
    restaurar('RATE_LIMIT_LIMIT');
    restaurar('RATE_LIMIT_WINDOW_MS');
    vi.resetModules();
  });

  it('responde 429 al exceder el limite', async () => {
    process.env.RATE_LIMIT_LIMIT = '2';
    process.env.RATE_LIMIT_WINDOW_MS = '60000';

    vi.resetModules();
    const { crearApp } = await import('../src/app');
    const app = crearApp();

    await request(app).get('/api/salud').expect(200);
    await request(app).get('/api/salud').expect(200);
    const respuesta = await request(app).get('/api/salud').expect(429);

    expect(respuesta.headers['retry-after']).toBeTruthy();
  });
});
