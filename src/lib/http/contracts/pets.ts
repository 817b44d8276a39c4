import { z } from "zod";

export const PetIdSchema = z.union([z.string(), z.number()]);

const optionalText = z.string().nullable().optional();

export const PetRecordSchema = z
  .object({
    id: PetIdSchema,
    name: optionalText,
    type: optionalText,
    breed: optionalText,
  })
  .passthrough();

export const PetsListRequestSchema = z.object({}).strict();

export const PetsDeleteRequestSchema = z.object({ id: PetIdSchema }).strict();

export const PetsListResponseSchema = z.array(PetRecordSchema);

// json-server answers a delete with `{}`, other backends with 204 and no body.
export const PetsMutationResponseSchema = z.unknown();

export type PetRecord = z.output<typeof PetRecordSchema>;
export type PetsDeleteRequest = z.input<typeof PetsDeleteRequestSchema>;
