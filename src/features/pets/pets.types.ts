import type { Pet } from "../../models";
import type { FilteredPet } from "./filter";

export type PetsLoadStatus = "idle" | "loading" | "ready" | "error";

export interface PetsState {
  /** Everything the server returned, minus confirmed deletions. */
  originalPets: Pet[];
  /** What the list renders. */
  petList: Pet[];
  /** `petList` with the search match ranges used for highlighting. */
  matches: FilteredPet[];
  query: string;
  /** Message of the last failed delete. */
  error: string | null;
  status: PetsLoadStatus;
  loadError: string | null;
}

export interface PetsStoreOptions {
  keepFilterOnDelete: boolean;
}

export type PetsStoreSubscriber = (state: PetsState) => void;
