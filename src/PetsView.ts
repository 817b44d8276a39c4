import { createPetsList, petsStore } from "@features/pets";
import { logUI } from "@lib/uiLog";
import { runViewCleanups, registerViewCleanup } from "./utils/viewLifecycle";

export async function PetsView(container: HTMLElement): Promise<void> {
  runViewCleanups(container);

  const list = createPetsList(container, {
    onSearchChange: (value) => petsStore.setQuery(value),
    onDeletePet: (pet) => {
      void petsStore.deletePet(pet.id);
    },
    onDismissError: () => petsStore.clearError(),
  });

  const unsubscribe = petsStore.subscribe((state) => list.render(state));

  registerViewCleanup(container, () => {
    unsubscribe();
    list.destroy();
  });

  logUI("INFO", "ui.pets.view_mounted");
  await petsStore.load();
}
