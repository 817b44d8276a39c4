import { config } from "@config/env";
import { normalizeError } from "@lib/http/call";
import { timeIt } from "@lib/obs/timeIt";
import { logUI } from "@lib/uiLog";
import { petsRepo } from "../../repos";
import type { Pet, PetId } from "../../models";
import { projectPets, toPetList, type FilteredPet } from "./filter";
import { recordPetsMutationFailure } from "./mutationTelemetry";
import type { PetsState, PetsStoreOptions, PetsStoreSubscriber } from "./pets.types";

function createInitialState(): PetsState {
  return {
    originalPets: [],
    petList: [],
    matches: [],
    query: "",
    error: null,
    status: "idle",
    loadError: null,
  };
}

function defaultOptions(): PetsStoreOptions {
  return { keepFilterOnDelete: config.keepFilterOnDelete };
}

let state: PetsState = createInitialState();
let options: PetsStoreOptions = defaultOptions();
const subscribers = new Set<PetsStoreSubscriber>();

function clonePet(pet: Pet): Pet {
  return { ...pet };
}

function snapshot(): PetsState {
  return {
    ...state,
    originalPets: state.originalPets.map(clonePet),
    petList: state.petList.map(clonePet),
    matches: state.matches.map((model) => ({ ...model, pet: clonePet(model.pet) })),
  };
}

function emit(): void {
  const snap = snapshot();
  for (const listener of subscribers) {
    listener(snap);
  }
}

function commit(next: PetsState): void {
  state = next;
  emit();
}

function project(pets: Pet[], query: string): Pick<PetsState, "petList" | "matches"> {
  const matches: FilteredPet[] = projectPets(pets, query);
  return { petList: toPetList(matches), matches };
}

export const petsStore = {
  subscribe(listener: PetsStoreSubscriber): () => void {
    subscribers.add(listener);
    listener(snapshot());
    return () => {
      subscribers.delete(listener);
    };
  },

  getSnapshot(): PetsState {
    return snapshot();
  },

  configure(next: Partial<PetsStoreOptions>): void {
    options = { ...options, ...next };
  },

  async load(): Promise<void> {
    commit({ ...state, status: "loading", loadError: null });
    try {
      const pets = await timeIt("list.load", () => petsRepo.list());
      commit({
        ...state,
        ...project(pets, state.query),
        originalPets: pets,
        status: "ready",
        error: null,
        loadError: null,
      });
    } catch (error) {
      const normalized = normalizeError(error);
      logUI("WARN", "ui.pets.load_failed", { code: normalized.code });
      commit({ ...state, status: "error", loadError: normalized.message });
    }
  },

  setQuery(query: string): void {
    if (query === state.query) return;
    commit({ ...state, ...project(state.originalPets, query), query });
  },

  /**
   * Deletes the pet remotely, then drops it from local state. Nothing local
   * changes until the server confirms; a failure only records its message in
   * `error`. The returned promise never rejects.
   */
  async deletePet(petId: PetId): Promise<void> {
    logUI("INFO", "ui.pets.delete_clicked", { pet_id: petId });
    try {
      await timeIt("delete", () => petsRepo.delete(petId), { fields: { pet_id: petId } });
    } catch (error) {
      const normalized = recordPetsMutationFailure("pets_delete", error, { pet_id: petId });
      commit({ ...state, error: normalized.message });
      return;
    }

    // read `originalPets` at resolution time, not at call time
    const remaining = state.originalPets.filter((pet) => pet.id !== petId);
    if (options.keepFilterOnDelete) {
      commit({ ...state, ...project(remaining, state.query), originalPets: remaining });
    } else {
      commit({ ...state, ...project(remaining, ""), originalPets: remaining, query: "" });
    }
    logUI("INFO", "ui.pets.deleted", { pet_id: petId, remaining: remaining.length });
  },

  clearError(): void {
    if (state.error === null) return;
    commit({ ...state, error: null });
  },

  __resetForTests(): void {
    state = createInitialState();
    options = defaultOptions();
    subscribers.clear();
  },
};
