import type { z } from "zod";
import { MalformedResponseError } from "../errors.js";
import type { RequestContext } from "../http.js";

/**
 * Validates a raw upstream payload against its wire schema. A mismatch is a
 * terminal `MalformedResponseError` naming the entity that was requested.
 */
export function decodeResponse<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  payload: unknown,
  context: RequestContext,
  identifier: string,
): T {
  const parsed = schema.safeParse(payload);
  if (parsed.success) return parsed.data;

  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
  throw new MalformedResponseError(
    context,
    identifier,
    `${issue?.message ?? "unexpected shape"}${where}`,
  );
}
