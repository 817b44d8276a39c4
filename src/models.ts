export type PetId = string | number;

export interface Pet {
  id: PetId;
  name?: string | null;
  type?: string | null;
  breed?: string | null;
  // the server may attach any further attributes (owner, age, image...)
  [key: string]: unknown;
}
