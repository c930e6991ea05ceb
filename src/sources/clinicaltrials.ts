import { z } from "zod";
import type { TwoTierCache } from "../cache/manager.js";
import { appConfig } from "../config.js";
import { MalformedResponseError } from "../errors.js";
import {
  RequestExecutor,
  type QueryParams,
  type RequestContext,
  type RequestTransport,
} from "../http.js";
import {
  trialPageSchema,
  type Competitor,
  type ConditionDrug,
  type ConditionLandscape,
  type RecentStart,
  type SourceName,
  type StopCategory,
  type TerminatedTrial,
  type Trial,
  type TrialPage,
  type WhitespaceResult,
} from "../lib/contracts.js";
import { stepOperationLog, withOperationLog } from "../telemetry.js";
import { decodeResponse } from "./decode.js";

const SOURCE: SourceName = "clinical_trials";
const CACHE_NAMESPACE = "ctgov_search";

export const PAGE_SIZE = 100;

const EXACT_MATCH_LIMIT = 50;
const CONDITION_TRIAL_LIMIT = 500;
const CONDITION_DRUG_LIMIT = 50;
const RECENT_START_FLOOR = "2024";

export const phaseCodes = ["EARLY_PHASE1", "PHASE1", "PHASE2", "PHASE3", "PHASE4", "NA"] as const;

export type PhaseCode = (typeof phaseCodes)[number];

const PHASE_LABELS: Record<PhaseCode, string> = {
  EARLY_PHASE1: "Early Phase 1",
  PHASE1: "Phase 1",
  PHASE2: "Phase 2",
  PHASE3: "Phase 3",
  PHASE4: "Phase 4",
  NA: "Not Applicable",
};

const PHASE_RANKS = new Map<string, number>([
  ["Not Applicable", 0],
  ["Early Phase 1", 1],
  ["Phase 1", 2],
  ["Phase 1/Phase 2", 3],
  ["Phase 2", 4],
  ["Phase 2/Phase 3", 5],
  ["Phase 3", 6],
  ["Phase 3/Phase 4", 7],
  ["Phase 4", 8],
]);

const LATE_PHASES: readonly PhaseCode[] = ["PHASE2", "PHASE3", "PHASE4"];
const TAGGED_PHASES: readonly PhaseCode[] = ["EARLY_PHASE1", "PHASE1", "PHASE2", "PHASE3", "PHASE4"];
const STOPPED_STATUSES = ["TERMINATED", "WITHDRAWN", "SUSPENDED"] as const;
const ACTIVE_STATUSES = new Set(["RECRUITING", "ACTIVE_NOT_RECRUITING", "ENROLLING_BY_INVITATION"]);
const DRUG_LIKE_TYPES = new Set(["Drug", "Biological"]);

// Checked in order; the first keyword found in the lowercased text decides.
const STOP_KEYWORDS: ReadonlyArray<readonly [string, StopCategory]> = [
  ["efficacy", "efficacy"],
  ["futility", "efficacy"],
  ["lack of efficacy", "efficacy"],
  ["no benefit", "efficacy"],
  ["safety", "safety"],
  ["adverse", "safety"],
  ["toxicity", "safety"],
  ["side effect", "safety"],
  ["enrollment", "enrollment"],
  ["accrual", "enrollment"],
  ["recruitment", "enrollment"],
  ["business", "business"],
  ["strategic", "business"],
  ["funding", "business"],
  ["commercial", "business"],
];

// ---------------------------------------------------------------------------
// Wire shapes
// ---------------------------------------------------------------------------

const optionalList = <T extends z.ZodTypeAny>(item: T) => z.array(item).nullish();
const dateStructSchema = z.object({ date: z.string().nullish() }).nullish();

const rawStudySchema = z.object({
  protocolSection: z
    .object({
      identificationModule: z
        .object({ nctId: z.string().nullish(), briefTitle: z.string().nullish() })
        .nullish(),
      statusModule: z
        .object({
          overallStatus: z.string().nullish(),
          whyStopped: z.string().nullish(),
          startDateStruct: dateStructSchema,
          primaryCompletionDateStruct: dateStructSchema,
        })
        .nullish(),
      designModule: z
        .object({
          phases: optionalList(z.string()),
          enrollmentInfo: z.object({ count: z.number().int().nullish() }).nullish(),
          studyType: z.string().nullish(),
        })
        .nullish(),
      descriptionModule: z.object({ briefSummary: z.string().nullish() }).nullish(),
      sponsorCollaboratorsModule: z
        .object({
          leadSponsor: z.object({ name: z.string().nullish() }).nullish(),
          collaborators: optionalList(z.object({ name: z.string().nullish() })),
        })
        .nullish(),
      armsInterventionsModule: z
        .object({
          interventions: optionalList(
            z.object({
              type: z.string().nullish(),
              name: z.string().nullish(),
              description: z.string().nullish(),
            }),
          ),
        })
        .nullish(),
      outcomesModule: z
        .object({
          primaryOutcomes: optionalList(
            z.object({ measure: z.string().nullish(), timeFrame: z.string().nullish() }),
          ),
        })
        .nullish(),
      conditionsModule: z.object({ conditions: optionalList(z.string()) }).nullish(),
      referencesModule: z
        .object({ references: optionalList(z.object({ pmid: z.string().nullish() })) })
        .nullish(),
    })
    .nullish(),
  hasResults: z.boolean().nullish(),
});

const studiesResponseSchema = z.object({
  studies: optionalList(rawStudySchema),
  nextPageToken: z.string().nullish(),
  totalCount: z.number().int().nullish(),
});

type RawStudy = z.infer<typeof rawStudySchema>;

// ---------------------------------------------------------------------------
// Pure helpers
// ---------------------------------------------------------------------------

/** `["PHASE2", "PHASE3"]` -> `"Phase 2/Phase 3"`; no phases means "Not Applicable". */
export function normalizePhase(phases: readonly string[]): string {
  if (phases.length === 0) return "Not Applicable";
  return phases
    .map((code) => (isPhaseCode(code) ? PHASE_LABELS[code] : code))
    .join("/");
}

function isPhaseCode(code: string): code is PhaseCode {
  return phaseCodes.some((candidate) => candidate === code);
}

/** Higher is later stage. Unrecognized labels rank with "Not Applicable". */
export function phaseRank(phase: string): number {
  return PHASE_RANKS.get(phase) ?? 0;
}

export function classifyStopReason(whyStopped: string | null | undefined): StopCategory {
  if (!whyStopped) return "unknown";
  const lower = whyStopped.toLowerCase();
  for (const [keyword, category] of STOP_KEYWORDS) {
    if (lower.includes(keyword)) return category;
  }
  return "other";
}

function titleCase(value: string): string {
  return value
    .replace(/_/g, " ")
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, lead: string, letter: string) => `${lead}${letter.toUpperCase()}`);
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export type SearchParamsInput = {
  drug?: string | null;
  condition?: string | null;
  term?: string | null;
  dateBefore?: Date | null;
  phaseFilter?: readonly PhaseCode[] | null;
  statusFilter?: readonly string[] | null;
  pageToken?: string | null;
  pageSize?: number;
};

/**
 * Registry query parameters. Date and phase constraints have no parameters of
 * their own and ride in `query.term` as AREA clauses.
 */
export function buildSearchParams(input: SearchParamsInput): QueryParams {
  const params: QueryParams = {
    format: "json",
    pageSize: input.pageSize ?? PAGE_SIZE,
    countTotal: "true",
  };

  if (input.condition) params["query.cond"] = input.condition;
  if (input.drug) params["query.intr"] = input.drug;

  const term: string[] = [];
  if (input.term) term.push(input.term);
  if (input.dateBefore) {
    term.push(`AREA[StudyFirstPostDate]RANGE[MIN, ${formatDate(input.dateBefore)}]`);
  }
  if (input.phaseFilter && input.phaseFilter.length > 0) {
    term.push(`AREA[Phase](${input.phaseFilter.join(" OR ")})`);
  }
  if (term.length > 0) params["query.term"] = term.join(" ");

  if (input.statusFilter && input.statusFilter.length > 0) {
    params["filter.overallStatus"] = input.statusFilter.join(",");
  }
  if (input.pageToken) params.pageToken = input.pageToken;

  return params;
}

export function parseTrial(study: RawStudy): Trial {
  const protocol = study.protocolSection;
  const status = protocol?.statusModule;
  const design = protocol?.designModule;
  const sponsors = protocol?.sponsorCollaboratorsModule;

  return {
    nctId: protocol?.identificationModule?.nctId ?? "",
    title: protocol?.identificationModule?.briefTitle ?? "",
    briefSummary: protocol?.descriptionModule?.briefSummary ?? null,
    phase: normalizePhase(design?.phases ?? []),
    overallStatus: status?.overallStatus ?? "",
    whyStopped: status?.whyStopped ?? null,
    conditions: protocol?.conditionsModule?.conditions ?? [],
    interventions: (protocol?.armsInterventionsModule?.interventions ?? []).map((entry) => ({
      type: titleCase(entry.type ?? ""),
      name: entry.name ?? "",
      description: entry.description ?? null,
    })),
    sponsor: sponsors?.leadSponsor?.name ?? null,
    collaborators: (sponsors?.collaborators ?? []).flatMap((entry) => (entry.name ? [entry.name] : [])),
    enrollment: design?.enrollmentInfo?.count ?? null,
    startDate: status?.startDateStruct?.date ?? null,
    completionDate: status?.primaryCompletionDateStruct?.date ?? null,
    studyType: design?.studyType ?? null,
    primaryOutcomes: (protocol?.outcomesModule?.primaryOutcomes ?? []).map((outcome) => ({
      measure: outcome.measure ?? "",
      timeFrame: outcome.timeFrame ?? null,
    })),
    resultsPosted: study.hasResults ?? false,
    references: (protocol?.referencesModule?.references ?? []).flatMap((ref) =>
      ref.pmid ? [ref.pmid] : [],
    ),
  };
}

function primaryDrug(trial: Trial) {
  return trial.interventions.find((intervention) => DRUG_LIKE_TYPES.has(intervention.type)) ?? null;
}

/**
 * One candidate per trial (its first drug-like intervention), ranked by phase
 * then active status, keeping the best-ranked trial for each drug name.
 */
export function rankConditionDrugs(trials: readonly Trial[], limit = CONDITION_DRUG_LIMIT): ConditionDrug[] {
  const candidates: ConditionDrug[] = [];
  for (const trial of trials) {
    const drug = primaryDrug(trial);
    if (!drug) continue;
    candidates.push({
      nctId: trial.nctId,
      drugName: drug.name,
      condition: trial.conditions[0] ?? null,
      phase: trial.phase,
      status: trial.overallStatus,
    });
  }

  const activeFirst = (candidate: ConditionDrug) => (ACTIVE_STATUSES.has(candidate.status) ? 1 : 0);
  candidates.sort(
    (a, b) => phaseRank(b.phase) - phaseRank(a.phase) || activeFirst(b) - activeFirst(a),
  );

  const seen = new Set<string>();
  const unique: ConditionDrug[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.drugName)) continue;
    seen.add(candidate.drugName);
    unique.push(candidate);
  }
  return unique.slice(0, limit);
}

type CompetitorAccumulator = Omit<Competitor, "statuses"> & { statuses: Set<string> };

/**
 * Groups drug and biologic trials by sponsor and drug name. Trials without a
 * drug-like intervention are left out of every figure except the total.
 */
export function aggregateLandscape(trials: readonly Trial[], topN = 50): ConditionLandscape {
  const phaseDistribution: Record<string, number> = {};
  const recentStarts: RecentStart[] = [];
  const groups = new Map<string, CompetitorAccumulator>();

  for (const trial of trials) {
    const drug = primaryDrug(trial);
    if (!drug) continue;

    phaseDistribution[trial.phase] = (phaseDistribution[trial.phase] ?? 0) + 1;

    if (trial.startDate && trial.startDate >= RECENT_START_FLOOR) {
      recentStarts.push({
        nctId: trial.nctId,
        sponsor: trial.sponsor,
        drug: drug.name,
        phase: trial.phase,
      });
    }

    const key = JSON.stringify([trial.sponsor, drug.name]);
    let group = groups.get(key);
    if (!group) {
      group = {
        sponsor: trial.sponsor,
        drugName: drug.name,
        drugType: drug.type,
        maxPhase: trial.phase,
        trialCount: 0,
        statuses: new Set<string>(),
        totalEnrollment: 0,
        mostRecentStart: null,
      };
      groups.set(key, group);
    }

    group.trialCount += 1;
    group.statuses.add(trial.overallStatus);
    group.totalEnrollment += trial.enrollment ?? 0;
    if (phaseRank(trial.phase) > phaseRank(group.maxPhase)) {
      group.maxPhase = trial.phase;
    }
    if (trial.startDate && (group.mostRecentStart === null || trial.startDate > group.mostRecentStart)) {
      group.mostRecentStart = trial.startDate;
    }
  }

  const competitors: Competitor[] = [...groups.values()]
    .map((group) => ({ ...group, statuses: [...group.statuses] }))
    .sort(
      (a, b) =>
        phaseRank(b.maxPhase) - phaseRank(a.maxPhase) || b.totalEnrollment - a.totalEnrollment,
    );

  return {
    totalTrialCount: trials.length,
    competitors: competitors.slice(0, topN),
    phaseDistribution,
    recentStarts,
  };
}

function toTerminatedTrial(trial: Trial): TerminatedTrial {
  return {
    nctId: trial.nctId,
    title: trial.title,
    drugName: primaryDrug(trial)?.name ?? null,
    condition: trial.conditions[0] ?? null,
    phase: trial.phase,
    whyStopped: trial.whyStopped,
    stopCategory: classifyStopReason(trial.whyStopped),
    enrollment: trial.enrollment,
    sponsor: trial.sponsor,
    startDate: trial.startDate,
    terminationDate: trial.completionDate,
    references: trial.references,
  };
}

function searchLabel(params: QueryParams): string {
  const parts = [params["query.intr"], params["query.cond"], params["query.term"]].filter(
    (part) => part != null && part !== "",
  );
  return parts.length > 0 ? parts.join(" / ") : "studies";
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export type SearchTrialsOptions = {
  condition?: string | null;
  dateBefore?: Date | null;
  phaseFilter?: readonly PhaseCode[] | null;
  maxResults?: number;
};

export type ClinicalTrialsClientOptions = {
  transport?: RequestTransport;
  /** Caches each page response; off unless given. */
  cache?: TwoTierCache | null;
  url?: string;
  ttlSeconds?: number;
};

export class ClinicalTrialsClient {
  private readonly transport: RequestTransport;
  private readonly cache: TwoTierCache | null;
  private readonly url: string;
  private readonly ttlSeconds: number;

  constructor(options: ClinicalTrialsClientOptions = {}) {
    this.transport = options.transport ?? new RequestExecutor();
    this.cache = options.cache ?? null;
    this.url = options.url ?? appConfig.endpoints.clinicalTrials;
    this.ttlSeconds = options.ttlSeconds ?? appConfig.cache.ttlSeconds;
  }

  async searchTrials(drug: string, options: SearchTrialsOptions = {}): Promise<Trial[]> {
    const maxResults = options.maxResults ?? 200;
    return withOperationLog(SOURCE, "search_trials", { drug, condition: options.condition ?? null }, () =>
      this.collectTrials(
        {
          drug,
          condition: options.condition,
          dateBefore: options.dateBefore,
          phaseFilter: options.phaseFilter,
        },
        maxResults,
        "search_trials",
      ),
    );
  }

  /**
   * Whether any trial pairs `drug` with `condition`. When none does, the
   * result also lists the drugs other sponsors take through phase 2+ trials
   * for the condition.
   */
  async detectWhitespace(
    drug: string,
    condition: string,
    options: { dateBefore?: Date | null } = {},
  ): Promise<WhitespaceResult> {
    const { dateBefore } = options;
    return withOperationLog(SOURCE, "detect_whitespace", { drug, condition }, async (log) => {
      const [exact, drugOnlyTrials, conditionOnlyTrials] = await Promise.all([
        this.collectTrials({ drug, condition, dateBefore }, EXACT_MATCH_LIMIT, "detect_whitespace"),
        this.countTrials({ drug, dateBefore }),
        this.countTrials({ condition, dateBefore }),
      ]);

      let conditionDrugs: ConditionDrug[] = [];
      if (exact.length === 0) {
        const conditionTrials = await this.collectTrials(
          { condition, dateBefore, phaseFilter: LATE_PHASES },
          CONDITION_TRIAL_LIMIT,
          "detect_whitespace",
        );
        conditionDrugs = rankConditionDrugs(conditionTrials);
        stepOperationLog(log, "whitespace.condition_drugs", {
          trials: conditionTrials.length,
          drugs: conditionDrugs.length,
        });
      }

      return {
        isWhitespace: exact.length === 0,
        exactMatchCount: exact.length,
        drugOnlyTrials,
        conditionOnlyTrials,
        conditionDrugs,
      };
    });
  }

  async getLandscape(
    condition: string,
    options: { dateBefore?: Date | null; topN?: number } = {},
  ): Promise<ConditionLandscape> {
    return withOperationLog(SOURCE, "get_landscape", { condition }, async () => {
      const trials = await this.collectTrials(
        { condition, dateBefore: options.dateBefore, phaseFilter: TAGGED_PHASES },
        null,
        "get_landscape",
      );
      return aggregateLandscape(trials, options.topN ?? 50);
    });
  }

  /** Terminated, withdrawn and suspended trials matching a free-text query. */
  async getTerminated(
    query: string,
    options: { dateBefore?: Date | null; maxResults?: number } = {},
  ): Promise<TerminatedTrial[]> {
    return withOperationLog(SOURCE, "get_terminated", { query }, async () => {
      const trials = await this.collectTrials(
        { term: query, dateBefore: options.dateBefore, statusFilter: STOPPED_STATUSES },
        options.maxResults ?? 100,
        "get_terminated",
      );
      return trials.map(toTerminatedTrial);
    });
  }

  /** Follows continuation tokens until they run out, a page is short, or `maxResults` is met. */
  private async collectTrials(
    input: SearchParamsInput,
    maxResults: number | null,
    operation: string,
  ): Promise<Trial[]> {
    const trials: Trial[] = [];
    let pageToken: string | null = null;

    while (maxResults === null || trials.length < maxResults) {
      const page = await this.fetchPage(buildSearchParams({ ...input, pageToken }), operation);
      trials.push(...page.trials);
      pageToken = page.nextPageToken;
      if (!pageToken || page.trials.length < PAGE_SIZE) break;
    }

    return maxResults === null ? trials : trials.slice(0, maxResults);
  }

  private async countTrials(input: SearchParamsInput): Promise<number> {
    const params = buildSearchParams({ ...input, pageSize: 1 });
    const page = await this.fetchPage(params, "count_trials");
    if (page.totalCount === null) {
      throw new MalformedResponseError(
        { source: SOURCE, operation: "count_trials" },
        searchLabel(params),
        "totalCount missing from a counted search",
      );
    }
    return page.totalCount;
  }

  private async fetchPage(params: QueryParams, operation: string): Promise<TrialPage> {
    const cached = await this.cache?.get(CACHE_NAMESPACE, params, trialPageSchema);
    if (cached) return cached;

    const context: RequestContext = { source: SOURCE, operation };
    const identifier = searchLabel(params);
    const payload = await this.transport.getJson(this.url, params, { ...context, identifier });
    const body = decodeResponse(studiesResponseSchema, payload, context, identifier);

    const page: TrialPage = {
      trials: (body.studies ?? []).map(parseTrial),
      nextPageToken: body.nextPageToken ?? null,
      totalCount: body.totalCount ?? null,
    };
    await this.cache?.set(CACHE_NAMESPACE, params, page, this.ttlSeconds);
    return page;
  }
}
