import { getHttpAdapter } from "./provider";
import { UNKNOWN_ERROR_CODE, type AppError } from "./errors";
import type { ContractRequest, ContractResponse, HttpCommand } from "./port";

type UnknownRecord = Record<string, unknown>;
const isRecord = (v: unknown): v is UnknownRecord =>
  typeof v === "object" && v !== null;

const normalizeContext = (
  value: unknown,
): Record<string, string> | undefined => {
  if (!isRecord(value)) return undefined;
  const pairs = Object.entries(value).map(([k, v]) => [k, String(v)]);
  return pairs.length ? Object.fromEntries(pairs) : undefined;
};

function describeValue(value: UnknownRecord): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // circular or BigInt-bearing values
    return String(value);
  }
}

function responseStatus(error: UnknownRecord): number | undefined {
  const response = error.response;
  if (isRecord(response) && typeof response.status === "number") {
    return response.status;
  }
  return undefined;
}

/**
 * Flattens anything thrown by a request (AxiosError, Error, string, a
 * previously normalized AppError) into an AppError. The message is kept
 * verbatim so it can be shown to the user as-is.
 */
export function normalizeError(error: unknown): AppError {
  if (typeof error === "string") {
    return { code: UNKNOWN_ERROR_CODE, message: error };
  }

  if (isRecord(error)) {
    const status = responseStatus(error);
    const code =
      typeof error.code === "string"
        ? error.code
        : status !== undefined
          ? `HTTP/${status}`
          : UNKNOWN_ERROR_CODE;
    const message =
      typeof error.message === "string"
        ? error.message
        : typeof error.name === "string"
          ? error.name
          : describeValue(error);

    const out: AppError = { code, message };

    let context = normalizeContext(error.context);
    if (status !== undefined) {
      context = { ...(context ?? {}), status: String(status) };
    }
    if (context) out.context = context;

    if (error.cause) out.cause = normalizeError(error.cause);

    return out;
  }

  return { code: UNKNOWN_ERROR_CODE, message: String(error) };
}

export async function call<K extends HttpCommand>(
  cmd: K,
  args: ContractRequest<K>,
): Promise<ContractResponse<K>> {
  const adapter = getHttpAdapter();
  try {
    return await adapter.invoke(cmd, args);
  } catch (err) {
    throw normalizeError(err);
  }
}
