/**
 * Contrato del almacen de plantillas (solo lectura en tiempo de request).
 */
export type ItemPlantillaRegistrado = {
  id: string;
  descripcion: string;
  puntosPenalizacion: number;
  orden: number;
};

export type PlantillaConItems = {
  id: string;
  licenciaId: string;
  puntosMaximos: number;
  /** Ordenados por `orden` ascendente. */
  items: ItemPlantillaRegistrado[];
};

export type NuevaPlantilla = {
  licenciaId: string;
  puntosMaximos: number;
  items: Array<Omit<ItemPlantillaRegistrado, 'id'>>;
};

export interface AlmacenPlantillas {
  obtenerPorLicencia(licenciaId: string): Promise<PlantillaConItems | null>;
  obtenerPorId(plantillaId: string): Promise<PlantillaConItems | null>;
  /** Solo para el arranque (siembra); nunca se invoca desde un request. */
  crear(nueva: NuevaPlantilla): Promise<PlantillaConItems>;
}
