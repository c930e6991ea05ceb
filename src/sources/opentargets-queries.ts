export const ASSOCIATION_PAGE_SIZE = 500;
/** Ceiling on association pages per target, including the first. */
export const MAX_ASSOCIATION_PAGES = 40;

export const DRUG_SEARCH_QUERY = `
  query SearchDrug($q: String!) {
    search(queryString: $q, entityNames: ["drug"], page: { index: 0, size: 1 }) {
      hits {
        id
        entity
      }
    }
  }
`;

export const DISEASE_SEARCH_QUERY = `
  query SearchDisease($q: String!) {
    search(queryString: $q, entityNames: ["disease"], page: { index: 0, size: 1 }) {
      hits {
        id
        entity
      }
    }
  }
`;

export const DRUG_QUERY = `
  query Drug($id: String!) {
    drug(chemblId: $id) {
      id
      name
      synonyms
      tradeNames
      drugType
      isApproved
      maximumClinicalTrialPhase
      yearOfFirstApproval
      mechanismsOfAction {
        rows {
          mechanismOfAction
          actionType
          targets {
            id
            approvedSymbol
          }
        }
      }
      indications {
        rows {
          maxPhaseForIndication
          disease {
            id
            name
          }
          references {
            source
            ids
          }
        }
      }
      drugWarnings {
        warningType
        description
        toxicityClass
        country
        year
        efoId
      }
      adverseEvents(page: { index: 0, size: 100 }) {
        rows {
          name
          meddraCode
          count
          logLR
        }
        criticalValue
      }
    }
  }
`;

const ASSOCIATION_ROW_FIELDS = `
  rows {
    disease {
      id
      name
      therapeuticAreas {
        id
        name
      }
    }
    score
    datatypeScores {
      id
      score
    }
  }
`;

export const TARGET_QUERY = `
  query Target($id: String!) {
    target(ensemblId: $id) {
      id
      approvedSymbol
      approvedName
      associatedDiseases(page: { index: 0, size: ${ASSOCIATION_PAGE_SIZE} }) {
        count
        ${ASSOCIATION_ROW_FIELDS}
      }
      pathways {
        pathwayId
        pathway
        topLevelTerm
      }
      interactions(page: { index: 0, size: 200 }) {
        rows {
          intB
          intBBiologicalRole
          score
          sourceDatabase
          count
          targetB {
            id
            approvedSymbol
          }
        }
      }
      knownDrugs(size: 200) {
        rows {
          drugId
          prefName
          diseaseId
          label
          phase
          status
          mechanismOfAction
          ctIds
        }
      }
      expressions {
        tissue {
          id
          label
          anatomicalSystems
        }
        rna {
          value
          unit
          level
        }
        protein {
          level
          reliability
          cellType {
            name
            level
            reliability
          }
        }
      }
      mousePhenotypes {
        modelPhenotypeId
        modelPhenotypeLabel
        modelPhenotypeClasses {
          id
          label
        }
        biologicalModels {
          id
          allelicComposition
          geneticBackground
          literature
        }
      }
      safetyLiabilities {
        event
        eventId
        effects {
          direction
          dosing
        }
        datasource
        literature
        url
      }
      geneticConstraint {
        constraintType
        score
        oe
        oeLower
        oeUpper
        upperBin
      }
    }
  }
`;

export const ASSOCIATIONS_PAGE_QUERY = `
  query TargetAssociations($id: String!, $index: Int!, $size: Int!) {
    target(ensemblId: $id) {
      associatedDiseases(page: { index: $index, size: $size }) {
        count
        ${ASSOCIATION_ROW_FIELDS}
      }
    }
  }
`;

export const DISEASE_DRUGS_QUERY = `
  query DiseaseDrugs($id: String!, $size: Int!) {
    disease(efoId: $id) {
      knownDrugs(size: $size) {
        rows {
          drugId
          prefName
          diseaseId
          label
          phase
          status
          mechanismOfAction
          ctIds
        }
      }
    }
  }
`;

export const DISEASE_SYNONYMS_QUERY = `
  query DiseaseSynonyms($id: String!) {
    disease(efoId: $id) {
      id
      name
      parents {
        name
      }
      synonyms {
        relation
        terms
      }
    }
  }
`;
