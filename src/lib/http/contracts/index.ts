import type { z } from "zod";
import {
  PetsDeleteRequestSchema,
  PetsListRequestSchema,
  PetsListResponseSchema,
  PetsMutationResponseSchema,
} from "./pets";

export type HttpMethod = "get" | "delete";

export interface ContractDefinition<Req extends z.ZodTypeAny, Res extends z.ZodTypeAny> {
  method: HttpMethod;
  path: (request: z.output<Req>) => string;
  request: Req;
  response: Res;
}

export type AnyContract = ContractDefinition<z.ZodTypeAny, z.ZodTypeAny>;

function defineContract<Req extends z.ZodTypeAny, Res extends z.ZodTypeAny>(
  definition: ContractDefinition<Req, Res>,
): ContractDefinition<Req, Res> {
  return definition;
}

export const contracts = {
  pets_list: defineContract({
    method: "get",
    path: () => "/pets",
    request: PetsListRequestSchema,
    response: PetsListResponseSchema,
  }),
  pets_delete: defineContract({
    method: "delete",
    path: (request) => `/pets/${encodeURIComponent(String(request.id))}`,
    request: PetsDeleteRequestSchema,
    response: PetsMutationResponseSchema,
  }),
};

export type ContractEntry<K extends keyof typeof contracts> = (typeof contracts)[K];

export * from "./pets";
