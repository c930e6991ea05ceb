import { z } from "zod";
import { TwoTierCache } from "../cache/manager.js";
import { appConfig } from "../config.js";
import { EntityNotFoundError } from "../errors.js";
import { normalizeDrugName } from "../helpers/drug-names.js";
import { RequestExecutor, type RequestContext, type RequestTransport } from "../http.js";
import {
  drugProfileSchema,
  targetProfileSchema,
  type Association,
  type DiseaseSynonyms,
  type DrugProfile,
  type DrugSummary,
  type DrugTargetRef,
  type DrugWithTargets,
  type GeneticConstraint,
  type Indication,
  type Interaction,
  type InteractionType,
  type MousePhenotype,
  type Pathway,
  type SafetyLiability,
  type SourceName,
  type TargetProfile,
  type TissueExpression,
} from "../lib/contracts.js";
import { logEvent, stepOperationLog, withOperationLog } from "../telemetry.js";
import { decodeResponse } from "./decode.js";
import {
  ASSOCIATION_PAGE_SIZE,
  MAX_ASSOCIATION_PAGES,
  ASSOCIATIONS_PAGE_QUERY,
  DISEASE_DRUGS_QUERY,
  DISEASE_SEARCH_QUERY,
  DISEASE_SYNONYMS_QUERY,
  DRUG_QUERY,
  DRUG_SEARCH_QUERY,
  TARGET_QUERY,
} from "./opentargets-queries.js";

const SOURCE: SourceName = "open_targets";
const KNOWN_DRUGS_SIZE = 200;
const COMPETITOR_MIN_PHASE = 3;
const COMPETITOR_DISEASE_LIMIT = 10;

const INTERACTION_TYPES = new Map<string, InteractionType>([
  ["intact", "physical"],
  ["signor", "signalling"],
  ["reactome", "enzymatic"],
  ["string", "functional"],
]);

const SYNONYM_RELATIONS = new Map<string, "exact" | "related" | "narrow" | "broad">([
  ["hasExactSynonym", "exact"],
  ["hasRelatedSynonym", "related"],
  ["hasNarrowSynonym", "narrow"],
  ["hasBroadSynonym", "broad"],
]);

// ---------------------------------------------------------------------------
// Wire shapes
// ---------------------------------------------------------------------------

const optionalList = <T extends z.ZodTypeAny>(item: T) => z.array(item).nullish();

const searchResponseSchema = z.object({
  search: z
    .object({
      hits: optionalList(z.object({ id: z.string(), entity: z.string() })),
    })
    .nullish(),
});

const rawDrugSchema = z.object({
  id: z.string(),
  name: z.string(),
  synonyms: optionalList(z.string()),
  tradeNames: optionalList(z.string()),
  drugType: z.string().nullish(),
  isApproved: z.boolean().nullish(),
  maximumClinicalTrialPhase: z.number().nullish(),
  yearOfFirstApproval: z.number().int().nullish(),
  mechanismsOfAction: z
    .object({
      rows: optionalList(
        z.object({
          mechanismOfAction: z.string(),
          actionType: z.string().nullish(),
          targets: optionalList(z.object({ id: z.string(), approvedSymbol: z.string() })),
        }),
      ),
    })
    .nullish(),
  indications: z
    .object({
      rows: optionalList(
        z.object({
          maxPhaseForIndication: z.number(),
          disease: z.object({ id: z.string(), name: z.string() }),
          references: optionalList(
            z.object({ source: z.string(), ids: optionalList(z.string()) }),
          ),
        }),
      ),
    })
    .nullish(),
  drugWarnings: optionalList(
    z.object({
      warningType: z.string().nullish(),
      description: z.string().nullish(),
      toxicityClass: z.string().nullish(),
      country: z.string().nullish(),
      year: z.number().int().nullish(),
      efoId: z.string().nullish(),
    }),
  ),
  adverseEvents: z
    .object({
      rows: optionalList(
        z.object({
          name: z.string(),
          meddraCode: z.string().nullish(),
          count: z.number().int(),
          logLR: z.number(),
        }),
      ),
      criticalValue: z.number().nullish(),
    })
    .nullish(),
});

const rawAssociationConnectionSchema = z.object({
  count: z.number().int().nullish(),
  rows: optionalList(
    z.object({
      disease: z.object({
        id: z.string(),
        name: z.string(),
        therapeuticAreas: optionalList(z.object({ id: z.string(), name: z.string() })),
      }),
      score: z.number(),
      datatypeScores: optionalList(z.object({ id: z.string(), score: z.number() })),
    }),
  ),
});

const rawKnownDrugRowSchema = z.object({
  drugId: z.string().nullish(),
  prefName: z.string().nullish(),
  diseaseId: z.string().nullish(),
  label: z.string().nullish(),
  phase: z.number().nullish(),
  status: z.string().nullish(),
  mechanismOfAction: z.string().nullish(),
  ctIds: optionalList(z.string()),
});

const rawTargetSchema = z.object({
  id: z.string(),
  approvedSymbol: z.string(),
  approvedName: z.string().nullish(),
  associatedDiseases: rawAssociationConnectionSchema.nullish(),
  pathways: optionalList(
    z.object({
      pathwayId: z.string().nullish(),
      pathway: z.string().nullish(),
      topLevelTerm: z.string().nullish(),
    }),
  ),
  interactions: z
    .object({
      rows: optionalList(
        z.object({
          intB: z.string().nullish(),
          intBBiologicalRole: z.string().nullish(),
          score: z.number().nullish(),
          sourceDatabase: z.string().nullish(),
          count: z.number().int().nullish(),
          targetB: z
            .object({ id: z.string(), approvedSymbol: z.string().nullish() })
            .nullish(),
        }),
      ),
    })
    .nullish(),
  knownDrugs: z.object({ rows: optionalList(rawKnownDrugRowSchema) }).nullish(),
  expressions: optionalList(
    z.object({
      tissue: z
        .object({
          id: z.string().nullish(),
          label: z.string().nullish(),
          anatomicalSystems: optionalList(z.string()),
        })
        .nullish(),
      rna: z
        .object({
          value: z.number().nullish(),
          unit: z.string().nullish(),
          level: z.number().nullish(),
        })
        .nullish(),
      protein: z
        .object({
          level: z.number().nullish(),
          reliability: z.boolean().nullish(),
          cellType: optionalList(
            z.object({
              name: z.string(),
              level: z.number(),
              reliability: z.boolean().nullish(),
            }),
          ),
        })
        .nullish(),
    }),
  ),
  mousePhenotypes: optionalList(
    z.object({
      modelPhenotypeId: z.string().nullish(),
      modelPhenotypeLabel: z.string().nullish(),
      modelPhenotypeClasses: optionalList(z.object({ id: z.string(), label: z.string() })),
      biologicalModels: optionalList(
        z.object({
          id: z.string().nullish(),
          allelicComposition: z.string().nullish(),
          geneticBackground: z.string().nullish(),
          literature: optionalList(z.string()),
        }),
      ),
    }),
  ),
  safetyLiabilities: optionalList(
    z.object({
      event: z.string().nullish(),
      eventId: z.string().nullish(),
      effects: optionalList(
        z.object({ direction: z.string().nullish(), dosing: z.string().nullish() }),
      ),
      datasource: z.string().nullish(),
      literature: z.string().nullish(),
      url: z.string().nullish(),
    }),
  ),
  geneticConstraint: optionalList(
    z.object({
      constraintType: z.string(),
      score: z.number().nullish(),
      oe: z.number().nullish(),
      oeLower: z.number().nullish(),
      oeUpper: z.number().nullish(),
      upperBin: z.number().int().nullish(),
    }),
  ),
});

const drugResponseSchema = z.object({ drug: rawDrugSchema.nullable() });
const targetResponseSchema = z.object({ target: rawTargetSchema.nullable() });
const associationsPageResponseSchema = z.object({
  target: z.object({ associatedDiseases: rawAssociationConnectionSchema.nullish() }).nullable(),
});
const diseaseDrugsResponseSchema = z.object({
  disease: z
    .object({ knownDrugs: z.object({ rows: optionalList(rawKnownDrugRowSchema) }).nullish() })
    .nullable(),
});
const diseaseSynonymsResponseSchema = z.object({
  disease: z
    .object({
      id: z.string(),
      name: z.string(),
      parents: optionalList(z.object({ name: z.string() })),
      synonyms: optionalList(
        z.object({ relation: z.string(), terms: optionalList(z.string()) }),
      ),
    })
    .nullable(),
});

type RawDrug = z.infer<typeof rawDrugSchema>;
type RawTarget = z.infer<typeof rawTargetSchema>;
type RawAssociationRow = NonNullable<z.infer<typeof rawAssociationConnectionSchema>["rows"]>[number];
type RawKnownDrugRow = z.infer<typeof rawKnownDrugRowSchema>;

// ---------------------------------------------------------------------------
// Parsers: wire shape -> contract
// ---------------------------------------------------------------------------

function parseDrug(raw: RawDrug): DrugProfile {
  const targets: DrugTargetRef[] = [];
  for (const row of raw.mechanismsOfAction?.rows ?? []) {
    for (const target of row.targets ?? []) {
      targets.push({
        targetId: target.id,
        targetSymbol: target.approvedSymbol,
        mechanismOfAction: row.mechanismOfAction,
        actionType: row.actionType ?? null,
      });
    }
  }

  const indications: Indication[] = (raw.indications?.rows ?? []).map((row) => ({
    diseaseId: row.disease.id,
    diseaseName: row.disease.name,
    maxPhase: row.maxPhaseForIndication,
    references: (row.references ?? []).map((ref) => ({
      source: ref.source,
      ids: ref.ids ?? [],
    })),
  }));

  return {
    chemblId: raw.id,
    name: raw.name,
    synonyms: raw.synonyms ?? [],
    tradeNames: raw.tradeNames ?? [],
    drugType: raw.drugType ?? null,
    isApproved: raw.isApproved ?? null,
    maxClinicalPhase: raw.maximumClinicalTrialPhase ?? null,
    yearFirstApproved: raw.yearOfFirstApproval ?? null,
    warnings: (raw.drugWarnings ?? []).map((warning) => ({
      warningType: warning.warningType ?? null,
      description: warning.description ?? null,
      toxicityClass: warning.toxicityClass ?? null,
      country: warning.country ?? null,
      year: warning.year ?? null,
      efoId: warning.efoId ?? null,
    })),
    indications,
    targets,
    adverseEvents: (raw.adverseEvents?.rows ?? []).map((event) => ({
      name: event.name,
      meddraCode: event.meddraCode ?? null,
      count: event.count,
      logLikelihoodRatio: event.logLR,
    })),
    adverseEventsCriticalValue: raw.adverseEvents?.criticalValue ?? null,
  };
}

function parseAssociation(row: RawAssociationRow): Association {
  const datatypeScores: Record<string, number> = {};
  for (const entry of row.datatypeScores ?? []) {
    datatypeScores[entry.id] = entry.score;
  }
  return {
    diseaseId: row.disease.id,
    diseaseName: row.disease.name,
    overallScore: row.score,
    datatypeScores,
    therapeuticAreas: (row.disease.therapeuticAreas ?? []).map((area) => area.name),
  };
}

function parseDrugSummary(row: RawKnownDrugRow): DrugSummary {
  return {
    drugId: row.drugId ?? "",
    drugName: row.prefName ?? "",
    diseaseId: row.diseaseId ?? "",
    diseaseName: row.label ?? "",
    phase: row.phase ?? null,
    status: row.status ?? null,
    mechanismOfAction: row.mechanismOfAction ?? "",
    clinicalTrialIds: row.ctIds ?? [],
  };
}

/** A known phase beats an unknown one; unknown never replaces an entry. */
function outranks(phase: number | null, current: number | null): boolean {
  if (phase === null) return false;
  return current === null || phase > current;
}

function parseTarget(raw: RawTarget, associations: Association[]): TargetProfile {
  const pathways: Pathway[] = (raw.pathways ?? []).map((pathway) => ({
    pathwayId: pathway.pathwayId ?? "",
    pathwayName: pathway.pathway ?? "",
    topLevelPathway: pathway.topLevelTerm ?? "",
  }));

  const interactions: Interaction[] = (raw.interactions?.rows ?? []).map((row) => {
    const source = row.sourceDatabase ?? "";
    return {
      interactingTargetId: row.targetB?.id ?? row.intB ?? "",
      interactingTargetSymbol: row.targetB?.approvedSymbol ?? "",
      interactionScore: row.score ?? null,
      sourceDatabase: source,
      biologicalRole: row.intBBiologicalRole ?? "",
      evidenceCount: row.count ?? null,
      interactionType: INTERACTION_TYPES.get(source.toLowerCase()) ?? null,
    };
  });

  const expressions: TissueExpression[] = (raw.expressions ?? []).map((expression) => ({
    tissueId: expression.tissue?.id ?? "",
    tissueName: expression.tissue?.label ?? "",
    tissueAnatomicalSystem: expression.tissue?.anatomicalSystems?.[0] ?? "",
    rna: expression.rna
      ? {
          value: expression.rna.value ?? null,
          quantile: expression.rna.level ?? null,
          unit: expression.rna.unit ?? null,
        }
      : null,
    protein: expression.protein
      ? {
          level: expression.protein.level ?? null,
          reliability: expression.protein.reliability ?? null,
          cellTypes: (expression.protein.cellType ?? []).map((cell) => ({
            name: cell.name,
            level: cell.level,
            reliability: cell.reliability ?? null,
          })),
        }
      : null,
  }));

  const mousePhenotypes: MousePhenotype[] = (raw.mousePhenotypes ?? []).map((phenotype) => ({
    phenotypeId: phenotype.modelPhenotypeId ?? "",
    phenotypeLabel: phenotype.modelPhenotypeLabel ?? "",
    phenotypeCategories: (phenotype.modelPhenotypeClasses ?? []).map((entry) => entry.label),
    biologicalModels: (phenotype.biologicalModels ?? []).map((model) => ({
      modelId: model.id ?? "",
      allelicComposition: model.allelicComposition ?? "",
      geneticBackground: model.geneticBackground ?? "",
      literature: model.literature ?? [],
    })),
  }));

  const safetyLiabilities: SafetyLiability[] = (raw.safetyLiabilities ?? []).map((entry) => ({
    event: entry.event ?? null,
    eventId: entry.eventId ?? null,
    effects: (entry.effects ?? []).map((effect) => ({
      direction: effect.direction ?? "",
      dosing: effect.dosing ?? null,
    })),
    datasource: entry.datasource ?? null,
    literature: entry.literature ?? null,
    url: entry.url ?? null,
  }));

  const geneticConstraints: GeneticConstraint[] = (raw.geneticConstraint ?? []).map(
    (constraint) => ({
      constraintType: constraint.constraintType,
      oe: constraint.oe ?? null,
      oeLower: constraint.oeLower ?? null,
      oeUpper: constraint.oeUpper ?? null,
      score: constraint.score ?? null,
      upperBin: constraint.upperBin ?? null,
    }),
  );

  return {
    targetId: raw.id,
    symbol: raw.approvedSymbol,
    name: raw.approvedName ?? "",
    associations,
    pathways,
    interactions,
    drugSummaries: (raw.knownDrugs?.rows ?? []).map(parseDrugSummary),
    expressions,
    mousePhenotypes,
    safetyLiabilities,
    geneticConstraints,
  };
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export type OpenTargetsClientOptions = {
  transport?: RequestTransport;
  /** `null` disables caching; defaults to a cache built from `appConfig.cache`. */
  cache?: TwoTierCache | null;
  url?: string;
  ttlSeconds?: number;
};

/**
 * Open Targets Platform GraphQL client. Drug and target nodes are fetched in
 * one query each, parsed into contracts and cached; the accessors below read
 * slices of those cached nodes.
 */
export class OpenTargetsClient {
  private readonly transport: RequestTransport;
  private readonly cache: TwoTierCache | null;
  private readonly url: string;
  private readonly ttlSeconds: number;

  constructor(options: OpenTargetsClientOptions = {}) {
    this.transport = options.transport ?? new RequestExecutor();
    this.cache = options.cache === undefined ? new TwoTierCache() : options.cache;
    this.url = options.url ?? appConfig.endpoints.openTargets;
    this.ttlSeconds = options.ttlSeconds ?? appConfig.cache.ttlSeconds;
  }

  /** ChEMBL id of the first drug hit for `name`. */
  async resolveDrugName(name: string): Promise<string> {
    return this.resolveEntity(name, "drug", DRUG_SEARCH_QUERY);
  }

  async getDrug(name: string): Promise<DrugProfile> {
    return withOperationLog(SOURCE, "get_drug", { name }, async (log) => {
      const chemblId = await this.resolveDrugName(name);
      const params = { chembl_id: chemblId };

      const cached = await this.cache?.get("drug", params, drugProfileSchema);
      if (cached) {
        stepOperationLog(log, "cache.hit", { namespace: "drug", chemblId });
        return cached;
      }

      const context: RequestContext = { source: SOURCE, operation: "get_drug", identifier: chemblId };
      const payload = await this.transport.postGraphQL(this.url, DRUG_QUERY, { id: chemblId }, context);
      const { drug } = decodeResponse(drugResponseSchema, payload, context, chemblId);
      if (!drug) {
        throw new EntityNotFoundError(context, chemblId, `no drug found for ChEMBL id '${chemblId}'`);
      }

      const profile = parseDrug(drug);
      await this.cache?.set("drug", params, profile, this.ttlSeconds);
      return profile;
    });
  }

  async getTarget(targetId: string): Promise<TargetProfile> {
    return withOperationLog(SOURCE, "get_target", { targetId }, async (log) => {
      const params = { target_id: targetId };

      const cached = await this.cache?.get("target", params, targetProfileSchema);
      if (cached) {
        stepOperationLog(log, "cache.hit", { namespace: "target", targetId });
        return cached;
      }

      const context: RequestContext = { source: SOURCE, operation: "get_target", identifier: targetId };
      const payload = await this.transport.postGraphQL(this.url, TARGET_QUERY, { id: targetId }, context);
      const { target } = decodeResponse(targetResponseSchema, payload, context, targetId);
      if (!target) {
        throw new EntityNotFoundError(context, targetId, `no target found for '${targetId}'`);
      }

      const associations = await this.collectAssociations(targetId, target.associatedDiseases);
      const profile = parseTarget(target, associations);
      stepOperationLog(log, "target.parsed", {
        targetId,
        associations: profile.associations.length,
      });
      await this.cache?.set("target", params, profile, this.ttlSeconds);
      return profile;
    });
  }

  /** The drug plus every distinct target it acts on; any target failure fails the call. */
  async getDrugWithTargets(name: string): Promise<DrugWithTargets> {
    const drug = await this.getDrug(name);
    const targetIds = [...new Set(drug.targets.map((target) => target.targetId))];
    const targets = await Promise.all(targetIds.map((targetId) => this.getTarget(targetId)));
    return { drug, targets };
  }

  async getDrugIndications(name: string): Promise<Indication[]> {
    const drug = await this.getDrug(name);
    return drug.indications;
  }

  /** Known drugs for each of the drug's targets, keyed by target symbol. */
  async getDrugTargetCompetitors(name: string): Promise<Record<string, DrugSummary[]>> {
    const { drug, targets } = await this.getDrugWithTargets(name);
    const byId = new Map(targets.map((target) => [target.targetId, target]));

    const result: Record<string, DrugSummary[]> = {};
    for (const ref of drug.targets) {
      result[ref.targetSymbol] = byId.get(ref.targetId)?.drugSummaries ?? [];
    }
    return result;
  }

  /**
   * Late-stage (phase >= 3) drugs sharing a target with `name`, grouped by
   * disease. Diseases the drug itself is already in are dropped; the ten
   * diseases with the most siblings are kept.
   */
  async getDrugCompetitors(name: string): Promise<Record<string, string[]>> {
    const queried = normalizeDrugName(name);
    const { targets } = await this.getDrugWithTargets(name);

    const siblings = new Map<string, Set<string>>();
    for (const target of targets) {
      for (const summary of target.drugSummaries) {
        if (summary.phase === null || summary.phase < COMPETITOR_MIN_PHASE) continue;
        const drugs = siblings.get(summary.diseaseName) ?? new Set<string>();
        drugs.add(normalizeDrugName(summary.drugName));
        siblings.set(summary.diseaseName, drugs);
      }
    }

    for (const [disease, drugs] of siblings) {
      if (drugs.has(queried)) siblings.delete(disease);
    }

    return Object.fromEntries(
      [...siblings]
        .sort((a, b) => b[1].size - a[1].size)
        .slice(0, COMPETITOR_DISEASE_LIMIT)
        .map(([disease, drugs]) => [disease, [...drugs]]),
    );
  }

  /** Every drug trialled for a disease, one entry per drug at its highest phase. */
  async getDiseaseDrugs(diseaseId: string): Promise<DrugSummary[]> {
    const context: RequestContext = { source: SOURCE, operation: "get_disease_drugs", identifier: diseaseId };
    const payload = await this.transport.postGraphQL(
      this.url,
      DISEASE_DRUGS_QUERY,
      { id: diseaseId, size: KNOWN_DRUGS_SIZE },
      context,
    );
    const { disease } = decodeResponse(diseaseDrugsResponseSchema, payload, context, diseaseId);
    if (!disease) {
      throw new EntityNotFoundError(context, diseaseId, `no disease found for '${diseaseId}'`);
    }

    const byDrug = new Map<string, DrugSummary>();
    for (const row of disease.knownDrugs?.rows ?? []) {
      const summary = parseDrugSummary(row);
      const existing = byDrug.get(summary.drugId);
      if (!existing || outranks(summary.phase, existing.phase)) {
        byDrug.set(summary.drugId, summary);
      }
    }
    return [...byDrug.values()];
  }

  async getDiseaseSynonyms(name: string): Promise<DiseaseSynonyms> {
    const diseaseId = await this.resolveEntity(name, "disease", DISEASE_SEARCH_QUERY);
    const context: RequestContext = { source: SOURCE, operation: "get_disease_synonyms", identifier: diseaseId };
    const payload = await this.transport.postGraphQL(this.url, DISEASE_SYNONYMS_QUERY, { id: diseaseId }, context);
    const { disease } = decodeResponse(diseaseSynonymsResponseSchema, payload, context, diseaseId);
    if (!disease) {
      throw new EntityNotFoundError(context, name, `no disease found for '${name}'`);
    }

    const grouped: Pick<DiseaseSynonyms, "exact" | "related" | "narrow" | "broad"> = {
      exact: [],
      related: [],
      narrow: [],
      broad: [],
    };
    for (const entry of disease.synonyms ?? []) {
      const field = SYNONYM_RELATIONS.get(entry.relation);
      if (field) grouped[field].push(...(entry.terms ?? []));
    }

    return {
      diseaseId: disease.id,
      diseaseName: disease.name,
      parentNames: (disease.parents ?? []).map((parent) => parent.name),
      ...grouped,
    };
  }

  async getTargetAssociations(targetId: string, minScore = 0.1): Promise<Association[]> {
    const target = await this.getTarget(targetId);
    return target.associations.filter((association) => association.overallScore >= minScore);
  }

  async getTargetPathways(targetId: string): Promise<Pathway[]> {
    return (await this.getTarget(targetId)).pathways;
  }

  async getTargetInteractions(targetId: string): Promise<Interaction[]> {
    return (await this.getTarget(targetId)).interactions;
  }

  async getTargetDrugSummaries(targetId: string): Promise<DrugSummary[]> {
    return (await this.getTarget(targetId)).drugSummaries;
  }

  async getTargetExpressions(targetId: string): Promise<TissueExpression[]> {
    return (await this.getTarget(targetId)).expressions;
  }

  async getTargetMousePhenotypes(targetId: string): Promise<MousePhenotype[]> {
    return (await this.getTarget(targetId)).mousePhenotypes;
  }

  async getTargetSafetyLiabilities(targetId: string): Promise<SafetyLiability[]> {
    return (await this.getTarget(targetId)).safetyLiabilities;
  }

  async getTargetGeneticConstraints(targetId: string): Promise<GeneticConstraint[]> {
    return (await this.getTarget(targetId)).geneticConstraints;
  }

  close(): void {
    this.cache?.dispose();
  }

  private async resolveEntity(name: string, entity: "drug" | "disease", query: string): Promise<string> {
    const context: RequestContext = { source: SOURCE, operation: `resolve_${entity}_name`, identifier: name };
    const payload = await this.transport.postGraphQL(this.url, query, { q: name }, context);
    const { search } = decodeResponse(searchResponseSchema, payload, context, name);
    const hit = (search?.hits ?? []).find((candidate) => candidate.entity === entity);
    if (!hit) {
      throw new EntityNotFoundError(context, name, `no ${entity} found for '${name}'`);
    }
    return hit.id;
  }

  /**
   * Completes the association list when the first page came back full and the
   * reported total says there is more. Pages are appended in index order.
   */
  private async collectAssociations(
    targetId: string,
    first: z.infer<typeof rawAssociationConnectionSchema> | null | undefined,
  ): Promise<Association[]> {
    const rows: RawAssociationRow[] = [...(first?.rows ?? [])];
    const expected = first?.count ?? Number.POSITIVE_INFINITY;
    const context: RequestContext = { source: SOURCE, operation: "get_target_associations", identifier: targetId };

    let lastPageSize = rows.length;
    for (let index = 1; lastPageSize >= ASSOCIATION_PAGE_SIZE && rows.length < expected; index += 1) {
      if (index >= MAX_ASSOCIATION_PAGES) {
        logEvent("warn", "associations.page_limit", { targetId, pages: index, rows: rows.length });
        break;
      }
      const payload = await this.transport.postGraphQL(
        this.url,
        ASSOCIATIONS_PAGE_QUERY,
        { id: targetId, index, size: ASSOCIATION_PAGE_SIZE },
        context,
      );
      const { target } = decodeResponse(associationsPageResponseSchema, payload, context, targetId);
      const page = target?.associatedDiseases?.rows ?? [];
      rows.push(...page);
      lastPageSize = page.length;
    }

    return rows.map(parseAssociation);
  }
}
