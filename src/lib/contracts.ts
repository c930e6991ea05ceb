import { z } from "zod";

export const sourceNames = ["open_targets", "clinical_trials", "openfda"] as const;

export type SourceName = (typeof sourceNames)[number];

// ---------------------------------------------------------------------------
// Knowledge graph: targets
// ---------------------------------------------------------------------------

export const associationSchema = z.object({
  diseaseId: z.string(),
  diseaseName: z.string(),
  overallScore: z.number(),
  datatypeScores: z.record(z.string(), z.number()),
  therapeuticAreas: z.array(z.string()),
});

export const pathwaySchema = z.object({
  pathwayId: z.string(),
  pathwayName: z.string(),
  topLevelPathway: z.string(),
});

export const interactionTypes = ["physical", "functional", "signalling", "enzymatic"] as const;

export const interactionSchema = z.object({
  interactingTargetId: z.string(),
  interactingTargetSymbol: z.string(),
  /** Null for sources that do not score interactions (Reactome, Signor). */
  interactionScore: z.number().nullable(),
  sourceDatabase: z.string(),
  biologicalRole: z.string(),
  evidenceCount: z.number().int().nullable(),
  interactionType: z.enum(interactionTypes).nullable(),
});

export const drugSummarySchema = z.object({
  drugId: z.string(),
  drugName: z.string(),
  diseaseId: z.string(),
  diseaseName: z.string(),
  phase: z.number().nullable(),
  status: z.string().nullable(),
  mechanismOfAction: z.string(),
  clinicalTrialIds: z.array(z.string()),
});

export const cellTypeExpressionSchema = z.object({
  name: z.string(),
  level: z.number(),
  reliability: z.boolean().nullable(),
});

export const tissueExpressionSchema = z.object({
  tissueId: z.string(),
  tissueName: z.string(),
  tissueAnatomicalSystem: z.string(),
  /** Null when the tissue has no RNA measurement. */
  rna: z
    .object({
      value: z.number().nullable(),
      quantile: z.number().nullable(),
      unit: z.string().nullable(),
    })
    .nullable(),
  protein: z
    .object({
      level: z.number().nullable(),
      reliability: z.boolean().nullable(),
      cellTypes: z.array(cellTypeExpressionSchema),
    })
    .nullable(),
});

export const biologicalModelSchema = z.object({
  modelId: z.string(),
  allelicComposition: z.string(),
  geneticBackground: z.string(),
  literature: z.array(z.string()),
});

export const mousePhenotypeSchema = z.object({
  phenotypeId: z.string(),
  phenotypeLabel: z.string(),
  phenotypeCategories: z.array(z.string()),
  biologicalModels: z.array(biologicalModelSchema),
});

export const safetyLiabilitySchema = z.object({
  event: z.string().nullable(),
  eventId: z.string().nullable(),
  effects: z.array(
    z.object({
      direction: z.string(),
      dosing: z.string().nullable(),
    }),
  ),
  datasource: z.string().nullable(),
  literature: z.string().nullable(),
  url: z.string().nullable(),
});

export const geneticConstraintSchema = z.object({
  constraintType: z.string(),
  oe: z.number().nullable(),
  oeLower: z.number().nullable(),
  oeUpper: z.number().nullable(),
  score: z.number().nullable(),
  upperBin: z.number().int().nullable(),
});

export const targetProfileSchema = z.object({
  targetId: z.string(),
  symbol: z.string(),
  name: z.string(),
  associations: z.array(associationSchema),
  pathways: z.array(pathwaySchema),
  interactions: z.array(interactionSchema),
  drugSummaries: z.array(drugSummarySchema),
  expressions: z.array(tissueExpressionSchema),
  mousePhenotypes: z.array(mousePhenotypeSchema),
  safetyLiabilities: z.array(safetyLiabilitySchema),
  geneticConstraints: z.array(geneticConstraintSchema),
});

// ---------------------------------------------------------------------------
// Knowledge graph: drugs and diseases
// ---------------------------------------------------------------------------

export const drugTargetRefSchema = z.object({
  targetId: z.string(),
  targetSymbol: z.string(),
  mechanismOfAction: z.string(),
  actionType: z.string().nullable(),
});

export const drugWarningSchema = z.object({
  warningType: z.string().nullable(),
  description: z.string().nullable(),
  toxicityClass: z.string().nullable(),
  country: z.string().nullable(),
  year: z.number().int().nullable(),
  efoId: z.string().nullable(),
});

export const indicationSchema = z.object({
  diseaseId: z.string(),
  diseaseName: z.string(),
  maxPhase: z.number(),
  references: z.array(
    z.object({
      source: z.string(),
      ids: z.array(z.string()),
    }),
  ),
});

export const adverseEventSchema = z.object({
  name: z.string(),
  meddraCode: z.string().nullable(),
  count: z.number().int(),
  logLikelihoodRatio: z.number(),
});

export const drugProfileSchema = z.object({
  chemblId: z.string(),
  name: z.string(),
  synonyms: z.array(z.string()),
  tradeNames: z.array(z.string()),
  drugType: z.string().nullable(),
  isApproved: z.boolean().nullable(),
  maxClinicalPhase: z.number().nullable(),
  yearFirstApproved: z.number().int().nullable(),
  warnings: z.array(drugWarningSchema),
  indications: z.array(indicationSchema),
  targets: z.array(drugTargetRefSchema),
  adverseEvents: z.array(adverseEventSchema),
  adverseEventsCriticalValue: z.number().nullable(),
});

export const diseaseSynonymsSchema = z.object({
  diseaseId: z.string(),
  diseaseName: z.string(),
  parentNames: z.array(z.string()),
  exact: z.array(z.string()),
  related: z.array(z.string()),
  narrow: z.array(z.string()),
  broad: z.array(z.string()),
});

// ---------------------------------------------------------------------------
// Trial registry
// ---------------------------------------------------------------------------

export const interventionSchema = z.object({
  /** Title-cased registry type: "Drug", "Biological", "Device", ... */
  type: z.string(),
  name: z.string(),
  description: z.string().nullable(),
});

export const primaryOutcomeSchema = z.object({
  measure: z.string(),
  timeFrame: z.string().nullable(),
});

export const trialSchema = z.object({
  nctId: z.string(),
  title: z.string(),
  briefSummary: z.string().nullable(),
  /** Display phase, e.g. "Phase 2" or "Phase 1/Phase 2". */
  phase: z.string(),
  overallStatus: z.string(),
  whyStopped: z.string().nullable(),
  conditions: z.array(z.string()),
  interventions: z.array(interventionSchema),
  sponsor: z.string().nullable(),
  collaborators: z.array(z.string()),
  enrollment: z.number().int().nullable(),
  startDate: z.string().nullable(),
  completionDate: z.string().nullable(),
  studyType: z.string().nullable(),
  primaryOutcomes: z.array(primaryOutcomeSchema),
  resultsPosted: z.boolean(),
  /** PubMed ids. */
  references: z.array(z.string()),
});

export const trialPageSchema = z.object({
  trials: z.array(trialSchema),
  nextPageToken: z.string().nullable(),
  totalCount: z.number().int().nullable(),
});

export const conditionDrugSchema = z.object({
  nctId: z.string(),
  drugName: z.string(),
  condition: z.string().nullable(),
  phase: z.string(),
  status: z.string(),
});

export const whitespaceResultSchema = z.object({
  isWhitespace: z.boolean(),
  exactMatchCount: z.number().int().nonnegative(),
  drugOnlyTrials: z.number().int().nonnegative(),
  conditionOnlyTrials: z.number().int().nonnegative(),
  conditionDrugs: z.array(conditionDrugSchema),
});

export const competitorSchema = z.object({
  sponsor: z.string().nullable(),
  drugName: z.string(),
  drugType: z.string().nullable(),
  maxPhase: z.string(),
  trialCount: z.number().int().positive(),
  statuses: z.array(z.string()),
  totalEnrollment: z.number().int().nonnegative(),
  mostRecentStart: z.string().nullable(),
});

export const recentStartSchema = z.object({
  nctId: z.string(),
  sponsor: z.string().nullable(),
  drug: z.string(),
  phase: z.string(),
});

export const conditionLandscapeSchema = z.object({
  totalTrialCount: z.number().int().nonnegative(),
  competitors: z.array(competitorSchema),
  phaseDistribution: z.record(z.string(), z.number().int()),
  recentStarts: z.array(recentStartSchema),
});

export const stopCategories = [
  "efficacy",
  "safety",
  "enrollment",
  "business",
  "other",
  "unknown",
] as const;

export const stopCategorySchema = z.enum(stopCategories);

export const terminatedTrialSchema = z.object({
  nctId: z.string(),
  title: z.string(),
  drugName: z.string().nullable(),
  condition: z.string().nullable(),
  phase: z.string(),
  whyStopped: z.string().nullable(),
  stopCategory: stopCategorySchema,
  enrollment: z.number().int().nullable(),
  sponsor: z.string().nullable(),
  startDate: z.string().nullable(),
  terminationDate: z.string().nullable(),
  references: z.array(z.string()),
});

// ---------------------------------------------------------------------------
// Adverse event reports (FAERS)
// ---------------------------------------------------------------------------

export const faersReactionCountSchema = z.object({
  /** MedDRA preferred term. */
  term: z.string(),
  count: z.number().int().nonnegative(),
});

export const faersEventSchema = z.object({
  medicinalProduct: z.string().nullable(),
  drugIndication: z.string().nullable(),
  reaction: z.string().nullable(),
  reactionOutcome: z.string().nullable(),
  /** Registry flag: "1" serious, "2" not serious. */
  serious: z.string().nullable(),
  companyNumber: z.string().nullable(),
});

export type Association = z.infer<typeof associationSchema>;
export type Pathway = z.infer<typeof pathwaySchema>;
export type InteractionType = (typeof interactionTypes)[number];
export type Interaction = z.infer<typeof interactionSchema>;
export type DrugSummary = z.infer<typeof drugSummarySchema>;
export type TissueExpression = z.infer<typeof tissueExpressionSchema>;
export type MousePhenotype = z.infer<typeof mousePhenotypeSchema>;
export type SafetyLiability = z.infer<typeof safetyLiabilitySchema>;
export type GeneticConstraint = z.infer<typeof geneticConstraintSchema>;
export type TargetProfile = z.infer<typeof targetProfileSchema>;
export type DrugTargetRef = z.infer<typeof drugTargetRefSchema>;
export type DrugWarning = z.infer<typeof drugWarningSchema>;
export type Indication = z.infer<typeof indicationSchema>;
export type AdverseEvent = z.infer<typeof adverseEventSchema>;
export type DrugProfile = z.infer<typeof drugProfileSchema>;
export type DiseaseSynonyms = z.infer<typeof diseaseSynonymsSchema>;
export type Intervention = z.infer<typeof interventionSchema>;
export type PrimaryOutcome = z.infer<typeof primaryOutcomeSchema>;
export type Trial = z.infer<typeof trialSchema>;
export type TrialPage = z.infer<typeof trialPageSchema>;
export type ConditionDrug = z.infer<typeof conditionDrugSchema>;
export type WhitespaceResult = z.infer<typeof whitespaceResultSchema>;
export type Competitor = z.infer<typeof competitorSchema>;
export type RecentStart = z.infer<typeof recentStartSchema>;
export type ConditionLandscape = z.infer<typeof conditionLandscapeSchema>;
export type StopCategory = z.infer<typeof stopCategorySchema>;
export type TerminatedTrial = z.infer<typeof terminatedTrialSchema>;

export type DrugWithTargets = {
  drug: DrugProfile;
  targets: TargetProfile[];
};
export type FaersReactionCount = z.infer<typeof faersReactionCountSchema>;
export type FaersEvent = z.infer<typeof faersEventSchema>;
