import { afterAll, afterEach, beforeAll, vi } from 'vitest';

type OpcionesEndurecimiento = {
  /** Permite console.warn/error sin fallar la prueba (solo para depurar). */
  permitirConsola?: boolean;

  /** Mensajes de console.warn/error que no cuentan como falla. */
  patronesConsola?: Array<string | RegExp>;

  /** Permite process warnings (DeprecationWarning, etc.). */
  permitirAvisosNode?: boolean;

  /** Warnings de Node que no cuentan como falla. */
  patronesAvisosNode?: Array<string | RegExp>;
};

function coincide(texto: string, patrones: Array<string | RegExp>): boolean {
  return patrones.some((patron) => (typeof patron === 'string' ? texto.includes(patron) : patron.test(texto)));
}

function describirArgumentos(args: unknown[]): string {
  try {
    return args
      .map((arg) => {
        if (arg instanceof Error) return `${arg.name}: ${arg.message}`;
        if (typeof arg === 'string') return arg;
        return JSON.stringify(arg);
      })
      .join(' ');
  } catch {
    return args.map((arg) => String(arg)).join(' ');
  }
}

function describirError(prefijo: string, error: unknown) {
  const msg = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
  return `${prefijo}: ${msg}`;
}

/**
 * Endurece la suite:
 * - Falla si hay `console.warn`/`console.error` fuera de la lista permitida.
 * - Captura `unhandledRejection`, `uncaughtException` y `process.warning`.
 *
 * Se relaja con `ALLOW_TEST_CONSOLE=1` o `ALLOW_NODE_WARNINGS=1`.
 */
export function instalarTestHardening(opciones: OpcionesEndurecimiento = {}) {
  const permitirConsola = Boolean(opciones.permitirConsola) || process.env.ALLOW_TEST_CONSOLE === '1';
  const permitirAvisosNode = Boolean(opciones.permitirAvisosNode) || process.env.ALLOW_NODE_WARNINGS === '1';
  const patronesConsola = opciones.patronesConsola ?? [];
  const patronesAvisosNode = opciones.patronesAvisosNode ?? [];

  const avisosConsola: string[] = [];
  const erroresConsola: string[] = [];
  const noControlados: string[] = [];
  const avisosNode: string[] = [];

  const alRechazoNoControlado = (razon: unknown) => {
    noControlados.push(describirError('unhandledRejection', razon));
  };
  const alExcepcionNoControlada = (error: unknown) => {
    noControlados.push(describirError('uncaughtException', error));
  };
  const alAvisoNode = (aviso: Error) => {
    const texto = `${aviso.name}: ${aviso.message}`;
    if (!coincide(texto, patronesAvisosNode)) avisosNode.push(texto);
  };

  const restauraciones: Array<() => void> = [];

  beforeAll(() => {
    if (!permitirConsola) {
      const warnOriginal = console.warn.bind(console);
      const errorOriginal = console.error.bind(console);

      const espiaWarn = vi.spyOn(console, 'warn').mockImplementation((...args: unknown[]) => {
        const msg = describirArgumentos(args);
        if (!coincide(msg, patronesConsola)) avisosConsola.push(msg);
        warnOriginal(...args);
      });
      const espiaError = vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
        const msg = describirArgumentos(args);
        if (!coincide(msg, patronesConsola)) erroresConsola.push(msg);
        errorOriginal(...args);
      });

      restauraciones.push(
        () => espiaWarn.mockRestore(),
        () => espiaError.mockRestore()
      );
    }

    process.on('unhandledRejection', alRechazoNoControlado);
    process.on('uncaughtException', alExcepcionNoControlada);
    process.on('warning', alAvisoNode);
  });

  afterEach(() => {
    const problemas: string[] = [];

    if (!permitirConsola) {
      if (avisosConsola.length > 0) problemas.push(`console.warn: ${avisosConsola.slice(0, 3).join(' | ')}`);
      if (erroresConsola.length > 0) problemas.push(`console.error: ${erroresConsola.slice(0, 3).join(' | ')}`);
    }
    if (!permitirAvisosNode && avisosNode.length > 0) {
      problemas.push(`process.warning: ${avisosNode.slice(0, 3).join(' | ')}`);
    }
    if (noControlados.length > 0) {
      problemas.push(`no controlados: ${noControlados.slice(0, 3).join(' | ')}`);
    }

    avisosConsola.length = 0;
    erroresConsola.length = 0;
    avisosNode.length = 0;
    noControlados.length = 0;

    if (problemas.length > 0) {
      throw new Error(`Fallo por warnings/errores en entorno de test: ${problemas.join(' ; ')}`);
    }
  });

  afterAll(() => {
    process.off('unhandledRejection', alRechazoNoControlado);
    process.off('uncaughtException', alExcepcionNoControlada);
    process.off('warning', alAvisoNode);
    restauraciones.forEach((restaurar) => restaurar());
  });
}
