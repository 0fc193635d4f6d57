/**
 * Almacen de plantillas sobre MongoDB.
 */
import { Types } from 'mongoose';
import { ItemPlantilla } from './modeloItemPlantilla';
import { PlantillaExamen } from './modeloPlantillaExamen';
import type { AlmacenPlantillas, NuevaPlantilla, PlantillaConItems } from './almacenPlantillas';

type PlantillaLean = { _id: Types.ObjectId; licenciaId: Types.ObjectId; puntosMaximos: number };

async function completarConItems(plantilla: PlantillaLean): Promise<PlantillaConItems> {
  const items = await ItemPlantilla.find({ plantillaId: plantilla._id }).sort({ orden: 1, _id: 1 }).lean();
  return {
    id: plantilla._id.toHexString(),
    licenciaId: plantilla.licenciaId.toHexString(),
    puntosMaximos: plantilla.puntosMaximos,
    items: items.map((item) => ({
      id: item._id.toHexString(),
      descripcion: item.descripcion,
      puntosPenalizacion: item.puntosPenalizacion,
      orden: item.orden
    }))
  };
}

export function crearAlmacenPlantillasMongo(): AlmacenPlantillas {
  return {
    async obtenerPorLicencia(licenciaId) {
      const plantilla = await PlantillaExamen.findOne({ licenciaId: new Types.ObjectId(licenciaId) }).lean();
      return plantilla ? completarConItems(plantilla) : null;
    },

    async obtenerPorId(plantillaId) {
      const plantilla = await PlantillaExamen.findById(plantillaId).lean();
      return plantilla ? completarConItems(plantilla) : null;
    },

    async crear(nueva: NuevaPlantilla) {
      const plantilla = await PlantillaExamen.create({
        licenciaId: new Types.ObjectId(nueva.licenciaId),
        puntosMaximos: nueva.puntosMaximos
      });
      try {
        await ItemPlantilla.insertMany(nueva.items.map((item) => ({ ...item, plantillaId: plantilla._id })));
      } catch (error) {
        // Una plantilla sin items no se puede usar; se retira para que la siguiente siembra la reintente.
        await PlantillaExamen.deleteOne({ _id: plantilla._id });
        throw error;
      }
      return completarConItems(plantilla);
    }
  };
}
