import { z } from "zod";
import { appConfig } from "../config.js";
import { TerminalResponseError } from "../errors.js";
import {
  RequestExecutor,
  type QueryParams,
  type RequestContext,
  type RequestTransport,
} from "../http.js";
import type { FaersEvent, FaersReactionCount, SourceName } from "../lib/contracts.js";
import { stepOperationLog, withOperationLog } from "../telemetry.js";
import { decodeResponse } from "./decode.js";

const SOURCE: SourceName = "openfda";

export const MAX_LIMIT = 1000;

const REACTION_COUNT_FIELD = "patient.reaction.reactionmeddrapt.exact";

const REACTION_OUTCOMES = new Map<string, string>([
  ["1", "Recovered/Resolved"],
  ["2", "Recovering/Resolving"],
  ["3", "Not Recovered/Not Resolved"],
  ["4", "Recovered/Resolved with Sequelae"],
  ["5", "Fatal"],
  ["6", "Unknown"],
]);

const optionalList = <T extends z.ZodTypeAny>(item: T) => z.array(item).nullish();
const code = z.union([z.string(), z.number()]).nullish();

const countResponseSchema = z.object({
  results: optionalList(z.object({ term: z.string(), count: z.number().int() })),
});

const rawEventSchema = z.object({
  serious: code,
  companynumb: z.string().nullish(),
  patient: z
    .object({
      drug: optionalList(
        z.object({
          medicinalproduct: z.string().nullish(),
          drugindication: z.string().nullish(),
        }),
      ),
      reaction: optionalList(
        z.object({
          reactionmeddrapt: z.string().nullish(),
          reactionoutcome: code,
        }),
      ),
    })
    .nullish(),
});

const eventsResponseSchema = z.object({ results: optionalList(rawEventSchema) });

type RawEvent = z.infer<typeof rawEventSchema>;

/** Human-readable reaction outcome; null for a missing or unrecognised code. */
export function reactionOutcome(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return REACTION_OUTCOMES.get(String(value)) ?? null;
}

/** One record per report: its first listed drug and first listed reaction. */
export function parseEvent(raw: RawEvent): FaersEvent {
  const drug = raw.patient?.drug?.[0];
  const reaction = raw.patient?.reaction?.[0];
  return {
    medicinalProduct: drug?.medicinalproduct ?? null,
    drugIndication: drug?.drugindication ?? null,
    reaction: reaction?.reactionmeddrapt ?? null,
    reactionOutcome: reactionOutcome(reaction?.reactionoutcome),
    serious: raw.serious == null ? null : String(raw.serious),
    companyNumber: raw.companynumb ?? null,
  };
}

export type OpenFdaClientOptions = {
  transport?: RequestTransport;
  url?: string;
  /** Defaults to `OPENFDA_API_KEY`; requests go out keyless when neither is set. */
  apiKey?: string | null;
};

/** openFDA drug adverse event (FAERS) client. */
export class OpenFdaClient {
  private readonly transport: RequestTransport;
  private readonly url: string;
  private readonly apiKey: string | null;

  constructor(options: OpenFdaClientOptions = {}) {
    this.transport = options.transport ?? new RequestExecutor();
    this.url = options.url ?? appConfig.endpoints.openFda;
    this.apiKey = options.apiKey === undefined ? appConfig.openFda.apiKey : options.apiKey;
  }

  /** Most frequently reported reactions for a drug, most reported first. */
  async getTopReactions(drugName: string, limit = 10): Promise<FaersReactionCount[]> {
    return withOperationLog(SOURCE, "get_top_reactions", { drugName, limit }, async (log) => {
      const params = { ...this.buildParams(drugName, limit), count: REACTION_COUNT_FIELD };
      const response = await this.fetch(params, "get_top_reactions", drugName);
      if (response === null) {
        stepOperationLog(log, "faers.no_reports", { drugName });
        return [];
      }
      const context: RequestContext = { source: SOURCE, operation: "get_top_reactions" };
      const body = decodeResponse(countResponseSchema, response.payload, context, drugName);
      return (body.results ?? []).map((row) => ({ term: row.term, count: row.count }));
    });
  }

  async getEvents(drugName: string, limit = 10): Promise<FaersEvent[]> {
    return withOperationLog(SOURCE, "get_events", { drugName, limit }, async (log) => {
      const response = await this.fetch(this.buildParams(drugName, limit), "get_events", drugName);
      if (response === null) {
        stepOperationLog(log, "faers.no_reports", { drugName });
        return [];
      }
      const context: RequestContext = { source: SOURCE, operation: "get_events" };
      const body = decodeResponse(eventsResponseSchema, response.payload, context, drugName);
      return (body.results ?? []).map(parseEvent);
    });
  }

  buildParams(drugName: string, limit: number): QueryParams {
    const params: QueryParams = {
      search: `patient.drug.medicinalproduct:"${drugName.replace(/"/g, "")}"`,
      limit: Math.min(limit, MAX_LIMIT),
    };
    if (this.apiKey) {
      params.api_key = this.apiKey;
    }
    return params;
  }

  // openFDA answers a search with no matching reports with 404.
  private async fetch(
    params: QueryParams,
    operation: string,
    drugName: string,
  ): Promise<{ payload: unknown } | null> {
    const context: RequestContext = { source: SOURCE, operation, identifier: drugName };
    try {
      return { payload: await this.transport.getJson(this.url, params, context) };
    } catch (error) {
      if (error instanceof TerminalResponseError && error.status === 404) {
        return null;
      }
      throw error;
    }
  }
}
