export { petsStore } from "./pets.store";
export { createPetsList, toDisplayName } from "./PetsList";
export type { PetsListCallbacks, PetsListInstance } from "./PetsList";
export { projectPets, toPetList } from "./filter";
export type { FilteredPet } from "./filter";
export { recordPetsMutationFailure, getPetsMutationFailureStats } from "./mutationTelemetry";
export type { PetsState, PetsLoadStatus, PetsStoreOptions, PetsStoreSubscriber } from "./pets.types";
