/**
 * Configuracion centralizada del backend.
 */
import dotenv from 'dotenv';

// Dotenv v17 puede emitir logs informativos; se silencian para mantener
// pruebas y consola limpias.
dotenv.config({ quiet: true });

function parsearNumeroSeguro(valor: unknown, porDefecto: number, { min, max }: { min?: number; max?: number } = {}) {
  if (valor === undefined || valor === null || valor === '') return porDefecto;
  const n = typeof valor === 'number' ? valor : Number(valor);
  if (!Number.isFinite(n)) return porDefecto;
  const clampedMax = typeof max === 'number' ? Math.min(max, n) : n;
  const clamped = typeof min === 'number' ? Math.max(min, clampedMax) : clampedMax;
  return clamped;
}

const puerto = parsearNumeroSeguro(process.env.PUERTO_API ?? process.env.PORT, 4000, { min: 1, max: 65_535 });
const mongoUri = process.env.MONGODB_URI ?? process.env.MONGO_URI ?? '';
const entorno = process.env.NODE_ENV ?? 'development';
const limiteJson = process.env.LIMITE_JSON ?? '1mb';
const corsOrigenes = (process.env.CORS_ORIGENES ?? 'http://localhost:5173')
  .split(',')
  .map((origen) => origen.trim())
  .filter(Boolean);

// En producción, el secreto JWT debe ser proporcionado por entorno (lo comparte el
// servicio de cuentas que emite los tokens). En desarrollo/test se permite un valor por defecto.
const jwtSecreto = process.env.JWT_SECRETO ?? '';
if (entorno === 'production' && !jwtSecreto) {
  throw new Error('JWT_SECRETO es requerido en producción');
}
const jwtSecretoEfectivo = jwtSecreto || 'cambia-este-secreto';
const jwtExpiraHoras = parsearNumeroSeguro(process.env.JWT_EXPIRA_HORAS, 8, { min: 1, max: 24 * 30 });

// Rate limit: configurable por entorno para tuning y para pruebas deterministas.
const rateLimitWindowMs = parsearNumeroSeguro(process.env.RATE_LIMIT_WINDOW_MS, 15 * 60 * 1000, {
  min: 1_000,
  max: 24 * 60 * 60 * 1000
});
const rateLimitLimit = parsearNumeroSeguro(process.env.RATE_LIMIT_LIMIT, 300, { min: 1, max: 10_000 });

// Historial: tamaño de pagina cuando el cliente no lo indica (el maximo aceptado es 100).
const paginaTamanoDefecto = Math.floor(parsearNumeroSeguro(process.env.PAGINA_TAMANO_DEFECTO, 20, { min: 1, max: 100 }));

export const configuracion = {
  puerto,
  mongoUri,
  entorno,
  limiteJson,
  corsOrigenes,
  jwtSecreto: jwtSecretoEfectivo,
  jwtExpiraHoras,
  rateLimitWindowMs,
  rateLimitLimit,
  paginaTamanoDefecto
};
