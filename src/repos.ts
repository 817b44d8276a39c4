// src/repos.ts
import { call } from "@lib/http/call";
import type { Pet, PetId } from "./models";

export const petsRepo = {
  async list(): Promise<Pet[]> {
    return await call("pets_list", {});
  },

  async delete(id: PetId): Promise<void> {
    await call("pets_delete", { id });
  },
};
