import { describe, it } from "node:test";
import assert from "node:assert";
import { TwoTierCache } from "../cache/manager.js";
import { ExhaustedRetryError, MalformedResponseError, TransientNetworkError } from "../errors.js";
import type { QueryParams, RequestContext, RequestTransport } from "../http.js";
import { setLogLevel } from "../telemetry.js";
import {
  ClinicalTrialsClient,
  aggregateLandscape,
  buildSearchParams,
  classifyStopReason,
  normalizePhase,
  parseTrial,
  phaseRank,
} from "./clinicaltrials.js";

setLogLevel("silent");

type JsonCall = { params: QueryParams; context: RequestContext };

class FakeRegistryTransport implements RequestTransport {
  readonly calls: JsonCall[] = [];

  constructor(private readonly respond: (params: QueryParams) => unknown) {}

  async getJson(_url: string, params: QueryParams, context: RequestContext): Promise<unknown> {
    this.calls.push({ params, context });
    return this.respond(params);
  }

  async postGraphQL(url: string): Promise<unknown> {
    throw new Error(`unexpected POST ${url}`);
  }

  async getText(url: string): Promise<string> {
    throw new Error(`unexpected GET ${url}`);
  }
}

type StudyInput = {
  phases?: string[];
  status?: string;
  interventions?: Array<{ type: string; name: string }>;
  sponsor?: string;
  enrollment?: number | null;
  start?: string | null;
  conditions?: string[];
  whyStopped?: string | null;
  completion?: string | null;
};

function study(nctId: string, input: StudyInput = {}) {
  return {
    protocolSection: {
      identificationModule: { nctId, briefTitle: `Study ${nctId}` },
      statusModule: {
        overallStatus: input.status ?? "RECRUITING",
        whyStopped: input.whyStopped ?? null,
        startDateStruct: input.start === null ? null : { date: input.start ?? "2023-01-01" },
        primaryCompletionDateStruct: input.completion ? { date: input.completion } : null,
      },
      designModule: {
        phases: input.phases ?? ["PHASE2"],
        enrollmentInfo: { count: input.enrollment === undefined ? 100 : input.enrollment },
        studyType: "INTERVENTIONAL",
      },
      sponsorCollaboratorsModule: { leadSponsor: { name: input.sponsor ?? "Acme" } },
      armsInterventionsModule: {
        interventions: input.interventions ?? [{ type: "DRUG", name: "Alpha" }],
      },
      conditionsModule: { conditions: input.conditions ?? ["Condition Y"] },
    },
  };
}

const studies = (prefix: string, count: number) =>
  Array.from({ length: count }, (_, index) => study(`${prefix}${index}`));

describe("buildSearchParams", () => {
  it("embeds date and phase constraints in query.term", () => {
    assert.deepStrictEqual(
      buildSearchParams({
        drug: "testomab",
        condition: "Condition Y",
        dateBefore: new Date("2020-06-30T00:00:00Z"),
        phaseFilter: ["PHASE2", "PHASE3"],
      }),
      {
        format: "json",
        pageSize: 100,
        countTotal: "true",
        "query.cond": "Condition Y",
        "query.intr": "testomab",
        "query.term": "AREA[StudyFirstPostDate]RANGE[MIN, 2020-06-30] AREA[Phase](PHASE2 OR PHASE3)",
      },
    );
  });

  it("appends clauses after a free-text term and carries status filter and token", () => {
    assert.deepStrictEqual(
      buildSearchParams({
        term: "testomab",
        dateBefore: new Date("2021-01-15T00:00:00Z"),
        statusFilter: ["TERMINATED", "WITHDRAWN"],
        pageToken: "tok",
        pageSize: 1,
      }),
      {
        format: "json",
        pageSize: 1,
        countTotal: "true",
        "query.term": "testomab AREA[StudyFirstPostDate]RANGE[MIN, 2021-01-15]",
        "filter.overallStatus": "TERMINATED,WITHDRAWN",
        pageToken: "tok",
      },
    );
  });
});

describe("trial parsing", () => {
  it("maps a registry record onto the trial contract", () => {
    const trial = parseTrial({
      protocolSection: {
        identificationModule: { nctId: "NCT00000001", briefTitle: "A trial" },
        statusModule: {
          overallStatus: "TERMINATED",
          whyStopped: "Sponsor decision",
          startDateStruct: { date: "2019-03" },
          primaryCompletionDateStruct: { date: "2020-11-30" },
        },
        designModule: { phases: ["PHASE1", "PHASE2"], enrollmentInfo: { count: 42 }, studyType: "INTERVENTIONAL" },
        descriptionModule: { briefSummary: "Summary text" },
        sponsorCollaboratorsModule: {
          leadSponsor: { name: "Acme" },
          collaborators: [{ name: "University A" }, { name: null }],
        },
        armsInterventionsModule: {
          interventions: [
            { type: "DIETARY_SUPPLEMENT", name: "Vitamin", description: null },
            { type: "BIOLOGICAL", name: "Testomab", description: "IV infusion" },
          ],
        },
        outcomesModule: { primaryOutcomes: [{ measure: "Response rate", timeFrame: "12 weeks" }] },
        conditionsModule: { conditions: ["Condition Y"] },
        referencesModule: { references: [{ pmid: "123456" }, { pmid: null }] },
      },
      hasResults: true,
    });

    assert.deepStrictEqual(trial, {
      nctId: "NCT00000001",
      title: "A trial",
      briefSummary: "Summary text",
      phase: "Phase 1/Phase 2",
      overallStatus: "TERMINATED",
      whyStopped: "Sponsor decision",
      conditions: ["Condition Y"],
      interventions: [
        { type: "Dietary Supplement", name: "Vitamin", description: null },
        { type: "Biological", name: "Testomab", description: "IV infusion" },
      ],
      sponsor: "Acme",
      collaborators: ["University A"],
      enrollment: 42,
      startDate: "2019-03",
      completionDate: "2020-11-30",
      studyType: "INTERVENTIONAL",
      primaryOutcomes: [{ measure: "Response rate", timeFrame: "12 weeks" }],
      resultsPosted: true,
      references: ["123456"],
    });
  });

  it("uses null and empty defaults for an empty record", () => {
    const trial = parseTrial({});
    assert.strictEqual(trial.phase, "Not Applicable");
    assert.strictEqual(trial.sponsor, null);
    assert.strictEqual(trial.enrollment, null);
    assert.deepStrictEqual(trial.interventions, []);
    assert.strictEqual(trial.resultsPosted, false);
  });

  it("normalizes and ranks phases", () => {
    assert.strictEqual(normalizePhase(["EARLY_PHASE1"]), "Early Phase 1");
    assert.strictEqual(normalizePhase(["PHASE2", "PHASE3"]), "Phase 2/Phase 3");
    assert.strictEqual(normalizePhase(["NA"]), "Not Applicable");
    assert.strictEqual(normalizePhase([]), "Not Applicable");
    assert.deepStrictEqual(
      ["Not Applicable", "Early Phase 1", "Phase 1", "Phase 1/Phase 2", "Phase 2", "Phase 2/Phase 3", "Phase 3", "Phase 3/Phase 4", "Phase 4", "Phase 9"].map(phaseRank),
      [0, 1, 2, 3, 4, 5, 6, 7, 8, 0],
    );
  });
});

describe("classifyStopReason", () => {
  it("returns unknown when there is no text", () => {
    assert.strictEqual(classifyStopReason(null), "unknown");
    assert.strictEqual(classifyStopReason(""), "unknown");
  });

  it("returns other when no keyword matches", () => {
    assert.strictEqual(classifyStopReason("Principal investigator relocated"), "other");
  });

  it("applies category priority rather than text position", () => {
    assert.strictEqual(classifyStopReason("Business decision following safety review"), "safety");
    assert.strictEqual(classifyStopReason("Slow ACCRUAL; funding ended"), "enrollment");
    assert.strictEqual(classifyStopReason("Futility at interim analysis"), "efficacy");
    assert.strictEqual(classifyStopReason("Strategic portfolio change"), "business");
  });
});

describe("aggregateLandscape", () => {
  const trials = [
    study("NCT_A", { sponsor: "Acme", phases: ["PHASE2"], enrollment: 100, start: "2023-05", status: "RECRUITING" }),
    study("NCT_B", { sponsor: "Acme", phases: ["PHASE3"], enrollment: 300, start: "2024-02", status: "ACTIVE_NOT_RECRUITING" }),
    study("NCT_C", {
      sponsor: "Beta Corp",
      phases: ["PHASE3"],
      enrollment: 500,
      start: "2022-01",
      status: "COMPLETED",
      interventions: [{ type: "DRUG", name: "Beta" }],
    }),
    study("NCT_D", {
      sponsor: "Gamma Inc",
      phases: ["PHASE1"],
      enrollment: null,
      start: "2024-06",
      interventions: [{ type: "BIOLOGICAL", name: "Gamma" }],
    }),
    study("NCT_E", { sponsor: "Devices Ltd", phases: ["PHASE3"], interventions: [{ type: "DEVICE", name: "Pump" }] }),
    study("NCT_F", {
      sponsor: "Delta",
      phases: ["EARLY_PHASE1"],
      enrollment: 20,
      start: null,
      interventions: [{ type: "PROCEDURE", name: "Surgery" }, { type: "DRUG", name: "Delta" }],
    }),
  ].map(parseTrial);

  it("groups by sponsor and drug and ranks by phase then enrollment", () => {
    const landscape = aggregateLandscape(trials);

    assert.strictEqual(landscape.totalTrialCount, 6);
    assert.deepStrictEqual(landscape.competitors, [
      {
        sponsor: "Beta Corp",
        drugName: "Beta",
        drugType: "Drug",
        maxPhase: "Phase 3",
        trialCount: 1,
        statuses: ["COMPLETED"],
        totalEnrollment: 500,
        mostRecentStart: "2022-01",
      },
      {
        sponsor: "Acme",
        drugName: "Alpha",
        drugType: "Drug",
        maxPhase: "Phase 3",
        trialCount: 2,
        statuses: ["RECRUITING", "ACTIVE_NOT_RECRUITING"],
        totalEnrollment: 400,
        mostRecentStart: "2024-02",
      },
      {
        sponsor: "Gamma Inc",
        drugName: "Gamma",
        drugType: "Biological",
        maxPhase: "Phase 1",
        trialCount: 1,
        statuses: ["RECRUITING"],
        totalEnrollment: 0,
        mostRecentStart: "2024-06",
      },
      {
        sponsor: "Delta",
        drugName: "Delta",
        drugType: "Drug",
        maxPhase: "Early Phase 1",
        trialCount: 1,
        statuses: ["RECRUITING"],
        totalEnrollment: 20,
        mostRecentStart: null,
      },
    ]);
    assert.deepStrictEqual(landscape.phaseDistribution, {
      "Phase 2": 1,
      "Phase 3": 2,
      "Phase 1": 1,
      "Early Phase 1": 1,
    });
    assert.deepStrictEqual(landscape.recentStarts, [
      { nctId: "NCT_B", sponsor: "Acme", drug: "Alpha", phase: "Phase 3" },
      { nctId: "NCT_D", sponsor: "Gamma Inc", drug: "Gamma", phase: "Phase 1" },
    ]);
  });

  it("keeps sponsor and drug name apart in the grouping", () => {
    const trial = (nctId: string, drugName: string, enrollment: number) =>
      parseTrial(study(nctId, { enrollment, interventions: [{ type: "DRUG", name: drugName }] }));

    const landscape = aggregateLandscape([
      { ...trial("NCT_K1", "C", 40), sponsor: null },
      { ...trial("NCT_K2", "C", 30), sponsor: "" },
      { ...trial("NCT_K3", "C", 20), sponsor: "A|B" },
      { ...trial("NCT_K4", "B|C", 10), sponsor: "A" },
    ]);

    assert.deepStrictEqual(
      landscape.competitors.map((competitor) => [competitor.sponsor, competitor.drugName, competitor.trialCount]),
      [
        [null, "C", 1],
        ["", "C", 1],
        ["A|B", "C", 1],
        ["A", "B|C", 1],
      ],
    );
  });

  it("truncates to topN", () => {
    const landscape = aggregateLandscape(trials, 2);
    assert.deepStrictEqual(
      landscape.competitors.map((competitor) => competitor.drugName),
      ["Beta", "Alpha"],
    );
  });
});

describe("ClinicalTrialsClient", () => {
  describe("searchTrials", () => {
    function pagedTransport() {
      return new FakeRegistryTransport((params) => {
        if (params.pageToken === "tok2") return { studies: studies("P2_", 100), nextPageToken: "tok3" };
        if (params.pageToken === "tok3") return { studies: studies("P3_", 30) };
        return { studies: studies("P1_", 100), nextPageToken: "tok2", totalCount: 230 };
      });
    }

    it("follows continuation tokens until the last page", async () => {
      const transport = pagedTransport();
      const client = new ClinicalTrialsClient({ transport });

      const trials = await client.searchTrials("testomab", { maxResults: 1000 });

      assert.strictEqual(trials.length, 230);
      assert.strictEqual(trials[100].nctId, "P2_0");
      assert.strictEqual(trials[229].nctId, "P3_29");
      assert.deepStrictEqual(
        transport.calls.map((call) => call.params.pageToken),
        [undefined, "tok2", "tok3"],
      );
      assert.strictEqual(transport.calls[0].context.source, "clinical_trials");
    });

    it("stops once maxResults is reached", async () => {
      const transport = pagedTransport();
      const client = new ClinicalTrialsClient({ transport });

      const trials = await client.searchTrials("testomab");

      assert.strictEqual(trials.length, 200);
      assert.strictEqual(transport.calls.length, 2);
    });

    it("stops on a short page even when a token is present", async () => {
      const transport = new FakeRegistryTransport(() => ({ studies: studies("S_", 40), nextPageToken: "more" }));
      const client = new ClinicalTrialsClient({ transport });

      const trials = await client.searchTrials("testomab");

      assert.strictEqual(trials.length, 40);
      assert.strictEqual(transport.calls.length, 1);
    });

    it("returns an empty list for an empty registry result", async () => {
      const transport = new FakeRegistryTransport(() => ({ studies: [], totalCount: 0 }));
      const client = new ClinicalTrialsClient({ transport });

      assert.deepStrictEqual(await client.searchTrials("nothing"), []);
    });

    it("serves repeated pages from the cache", async () => {
      const transport = pagedTransport();
      const client = new ClinicalTrialsClient({ transport, cache: new TwoTierCache({ persist: false }) });

      const first = await client.searchTrials("testomab", { maxResults: 1000 });
      const second = await client.searchTrials("testomab", { maxResults: 1000 });

      assert.strictEqual(second.length, first.length);
      assert.deepStrictEqual(second[229], first[229]);
      assert.strictEqual(transport.calls.length, 3);
    });

    it("reports a malformed page with the query it answered", async () => {
      const transport = new FakeRegistryTransport(() => ({ studies: "not a list" }));
      const client = new ClinicalTrialsClient({ transport });

      await assert.rejects(client.searchTrials("testomab", { condition: "Condition Y" }), (error: unknown) => {
        assert(error instanceof MalformedResponseError);
        assert.strictEqual(error.identifier, "testomab / Condition Y");
        assert.strictEqual(error.source, "clinical_trials");
        return true;
      });
    });

    it("propagates executor failures", async () => {
      const failure = new ExhaustedRetryError(
        { source: "clinical_trials", operation: "search_trials" },
        4,
        new TransientNetworkError({ source: "clinical_trials", operation: "search_trials" }, "HTTP 503", { status: 503 }),
      );
      const transport = new FakeRegistryTransport(() => {
        throw failure;
      });
      const client = new ClinicalTrialsClient({ transport });

      await assert.rejects(client.searchTrials("testomab"), (error: unknown) => error === failure);
    });
  });

  describe("detectWhitespace", () => {
    const conditionStudies = [
      study("NCT1", { phases: ["PHASE2"], status: "RECRUITING", interventions: [{ type: "DRUG", name: "Alpha" }] }),
      study("NCT2", { phases: ["PHASE3"], status: "COMPLETED", interventions: [{ type: "DRUG", name: "Beta" }] }),
      study("NCT3", {
        phases: ["PHASE2", "PHASE3"],
        status: "ACTIVE_NOT_RECRUITING",
        interventions: [{ type: "BIOLOGICAL", name: "Gamma" }],
      }),
      study("NCT4", { phases: ["PHASE4"], status: "COMPLETED", interventions: [{ type: "DRUG", name: "Delta" }] }),
      study("NCT5", { phases: ["PHASE2"], status: "COMPLETED", interventions: [{ type: "DRUG", name: "Epsilon" }] }),
      study("NCT6", { phases: ["PHASE2"], status: "RECRUITING", interventions: [{ type: "DRUG", name: "Beta" }] }),
      study("NCT7", { phases: ["PHASE3"], interventions: [{ type: "DEVICE", name: "Pump" }] }),
      study("NCT8", { phases: ["PHASE2"], status: "COMPLETED", interventions: [{ type: "DRUG", name: "Alpha" }] }),
    ];

    function whitespaceTransport(exactStudies: unknown[]) {
      return new FakeRegistryTransport((params) => {
        const hasDrug = params["query.intr"] === "drugX";
        const hasCondition = params["query.cond"] === "rareConditionY";
        if (hasDrug && hasCondition) return { studies: exactStudies, totalCount: exactStudies.length };
        if (params.pageSize === 1 && hasDrug) return { studies: [], totalCount: 40 };
        if (params.pageSize === 1 && hasCondition) return { studies: [], totalCount: 12 };
        if (hasCondition) return { studies: conditionStudies };
        throw new Error("unexpected search");
      });
    }

    it("lists other drugs for the condition when the pair is unexplored", async () => {
      const transport = whitespaceTransport([]);
      const client = new ClinicalTrialsClient({ transport });

      const result = await client.detectWhitespace("drugX", "rareConditionY");

      assert.strictEqual(result.isWhitespace, true);
      assert.strictEqual(result.exactMatchCount, 0);
      assert.strictEqual(result.drugOnlyTrials, 40);
      assert.strictEqual(result.conditionOnlyTrials, 12);
      assert.deepStrictEqual(
        result.conditionDrugs.map((drug) => [drug.drugName, drug.nctId, drug.phase]),
        [
          ["Delta", "NCT4", "Phase 4"],
          ["Beta", "NCT2", "Phase 3"],
          ["Gamma", "NCT3", "Phase 2/Phase 3"],
          ["Alpha", "NCT1", "Phase 2"],
          ["Epsilon", "NCT5", "Phase 2"],
        ],
      );
      assert.strictEqual(result.conditionDrugs[0].condition, "Condition Y");

      const conditionCall = transport.calls.find(
        (call) => call.params.pageSize === 100 && call.params["query.intr"] === undefined,
      );
      assert(conditionCall);
      assert.strictEqual(conditionCall.params["query.term"], "AREA[Phase](PHASE2 OR PHASE3 OR PHASE4)");
    });

    it("rejects a count response without a total", async () => {
      const transport = new FakeRegistryTransport((params) =>
        params.pageSize === 1 && params["query.intr"] === "drugX" ? { studies: [] } : { studies: [], totalCount: 0 },
      );
      const client = new ClinicalTrialsClient({ transport });

      await assert.rejects(client.detectWhitespace("drugX", "rareConditionY"), (error: unknown) => {
        assert(error instanceof MalformedResponseError);
        assert.strictEqual(error.operation, "count_trials");
        assert.strictEqual(error.identifier, "drugX");
        return true;
      });
    });

    it("skips the condition fetch when the pair has trials", async () => {
      const transport = whitespaceTransport([study("NCT9"), study("NCT10")]);
      const client = new ClinicalTrialsClient({ transport });

      const result = await client.detectWhitespace("drugX", "rareConditionY", {
        dateBefore: new Date("2020-06-30T00:00:00Z"),
      });

      assert.strictEqual(result.isWhitespace, false);
      assert.strictEqual(result.exactMatchCount, 2);
      assert.deepStrictEqual(result.conditionDrugs, []);
      assert.strictEqual(transport.calls.length, 3);
      for (const call of transport.calls) {
        assert.strictEqual(call.params["query.term"], "AREA[StudyFirstPostDate]RANGE[MIN, 2020-06-30]");
      }
    });
  });

  describe("getLandscape", () => {
    it("fetches every phase-tagged trial and aggregates them", async () => {
      const transport = new FakeRegistryTransport((params) =>
        params.pageToken === "next"
          ? { studies: [study("NCT_LAST", { sponsor: "Acme", enrollment: 50 })] }
          : { studies: studies("NCT_", 100), nextPageToken: "next" },
      );
      const client = new ClinicalTrialsClient({ transport });

      const landscape = await client.getLandscape("Condition Y");

      assert.strictEqual(landscape.totalTrialCount, 101);
      assert.strictEqual(landscape.competitors.length, 1);
      assert.strictEqual(landscape.competitors[0].trialCount, 101);
      assert.strictEqual(landscape.competitors[0].totalEnrollment, 10_050);
      assert.strictEqual(
        transport.calls[0].params["query.term"],
        "AREA[Phase](EARLY_PHASE1 OR PHASE1 OR PHASE2 OR PHASE3 OR PHASE4)",
      );
    });
  });

  describe("getTerminated", () => {
    it("filters on stopped statuses and classifies each record", async () => {
      const transport = new FakeRegistryTransport(() => ({
        studies: [
          study("NCT_T1", {
            status: "TERMINATED",
            whyStopped: "Unacceptable toxicity",
            interventions: [{ type: "BEHAVIORAL", name: "Diet" }, { type: "DRUG", name: "Testomab" }],
            completion: "2021-04-01",
          }),
          study("NCT_T2", { status: "WITHDRAWN", whyStopped: null, interventions: [{ type: "DEVICE", name: "Pump" }] }),
        ],
      }));
      const client = new ClinicalTrialsClient({ transport });

      const terminated = await client.getTerminated("testomab", { dateBefore: new Date("2022-01-01T00:00:00Z") });

      assert.deepStrictEqual(terminated[0], {
        nctId: "NCT_T1",
        title: "Study NCT_T1",
        drugName: "Testomab",
        condition: "Condition Y",
        phase: "Phase 2",
        whyStopped: "Unacceptable toxicity",
        stopCategory: "safety",
        enrollment: 100,
        sponsor: "Acme",
        startDate: "2023-01-01",
        terminationDate: "2021-04-01",
        references: [],
      });
      assert.strictEqual(terminated[1].drugName, null);
      assert.strictEqual(terminated[1].stopCategory, "unknown");

      const [call] = transport.calls;
      assert.strictEqual(call.params["filter.overallStatus"], "TERMINATED,WITHDRAWN,SUSPENDED");
      assert.strictEqual(call.params["query.term"], "testomab AREA[StudyFirstPostDate]RANGE[MIN, 2022-01-01]");
      assert.strictEqual(call.params["query.intr"], undefined);
    });

    it("caps the result at maxResults", async () => {
      const transport = new FakeRegistryTransport(() => ({ studies: studies("NCT_", 10) }));
      const client = new ClinicalTrialsClient({ transport });

      const terminated = await client.getTerminated("testomab", { maxResults: 3 });

      assert.deepStrictEqual(terminated.map((trial) => trial.nctId), ["NCT_0", "NCT_1", "NCT_2"]);
    });
  });
});
