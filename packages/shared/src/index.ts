// Raw rows as read from the PharmGKB tables, keyed by column header
export type Row = Record<string, string>

/** Combined row from drugs.tsv and chemicals.tsv with its resolved identifiers. */
export interface DrugRecord {
  pharmId: string
  name: string
  genericNames: string
  tradeNames: string
  brandMixtures: string
  types: string
  crossReferences: string
  smiles: string
  inchi: string
  rxNormIds: string
  atcIds: string
  pubchemCompoundIds: string
  // Derived from the conversion tables
  inchiKey: string
  chemblByPharmId: string
  chemblByPubchem: string
  chemblByInchi: string
  chemblId: string | undefined
}

export interface GeneRecord {
  pharmId: string
  ncbiGeneIds: string
  hgncIds: string
  ensemblIds: string
  name: string
  symbol: string
  alternateNames: string
  alternateSymbols: string
  crossReferences: string
}

export interface RelationshipRecord {
  entity1Id: string
  entity1Name: string
  entity1Type: string
  entity2Id: string
  entity2Name: string
  entity2Type: string
  evidence: string
  association: string
  pk: string
  pd: string
  pmids: string
}

/**
 * Run-scoped maps from PharmGKB accession IDs to emitted node dcids.
 * Filled by the gene and drug passes, read by the relationship pass.
 */
export interface IdentifierMaps {
  drugs: Map<string, string>
  genes: Map<string, string[]>
}

export const emptyIdentifierMaps = (): IdentifierMaps => ({
  drugs: new Map(),
  genes: new Map(),
})

export interface ConversionSummary {
  geneNodes: number
  drugNodes: number
  relationNodes: number
  skippedRelations: number
}

export { fillTemplate } from './mcf-template.js'
export type { McfTemplate, TemplateValues } from './mcf-template.js'
export { PipelineError, TemplateError, EnumLookupError } from './errors.js'
