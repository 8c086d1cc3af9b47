import type { WorkPaths } from '@pgx-graph/config'
import type { DrugRecord, GeneRecord, RelationshipRecord, Row } from '@pgx-graph/shared'
import { log } from '../lib/log.js'
import { mergeChemblIds } from '../mcf/identifiers.js'
import { cell, readCsv, readTsv, toLookup } from './tables.js'

/** Conversion tables used to find a drug's ChEMBL ID. */
export interface ChemblLookup {
  byPharmId: Map<string, string>
  byPubchemId: Map<string, string>
  inchiKeyByInchi: Map<string, string>
  byInchiKey: Map<string, string>
}

export async function loadChemblLookup(files: WorkPaths['conversion']): Promise<ChemblLookup> {
  const [pharm, pubchem, inchi, inchiKey] = await Promise.all([
    readCsv(files.pharmToChembl, ['PharmGKB ID', 'ChEMBL ID']),
    readCsv(files.pubchemToChembl, ['PubChem ID', 'ChEMBL ID']),
    readCsv(files.inchiToInchiKey, ['InChI', 'InChI Key']),
    readCsv(files.inchiKeyToChembl, ['InChI Key', 'ChEMBL ID']),
  ])
  return {
    byPharmId: toLookup(pharm, 'PharmGKB ID', 'ChEMBL ID'),
    byPubchemId: toLookup(pubchem, 'PubChem ID', 'ChEMBL ID'),
    inchiKeyByInchi: toLookup(inchi, 'InChI', 'InChI Key'),
    byInchiKey: toLookup(inchiKey, 'InChI Key', 'ChEMBL ID'),
  }
}

// Columns each source table must carry
export const DRUG_COLUMNS = [
  'PharmGKB Accession Id', 'Name', 'Generic Names', 'Trade Names', 'Brand Mixtures', 'Type',
  'Cross-references', 'SMILES', 'InChI', 'RxNorm Identifiers', 'ATC Identifiers', 'PubChem Compound Identifiers',
] as const
export const GENE_COLUMNS = [
  'PharmGKB Accession Id', 'NCBI Gene ID', 'HGNC ID', 'Ensembl Id', 'Name', 'Symbol',
  'Alternate Names', 'Alternate Symbols', 'Cross-references',
] as const
export const RELATION_COLUMNS = [
  'Entity1_id', 'Entity1_name', 'Entity1_type', 'Entity2_id', 'Entity2_name', 'Entity2_type',
  'Evidence', 'Association', 'PK', 'PD', 'PMIDs',
] as const

// A drug may list several PubChem compounds; the first one with a mapping wins.
const chemblForPubchem = (ids: string, lookup: ChemblLookup): string =>
  ids
    .split(',')
    .map(id => id.replace(/"/g, '').trim())
    .map(id => lookup.byPubchemId.get(id) ?? '')
    .find(Boolean) ?? ''

export function toDrugRecord(row: Row, lookup: ChemblLookup): DrugRecord {
  const pharmId = cell(row, 'PharmGKB Accession Id')
  const inchi = cell(row, 'InChI')
  const pubchemCompoundIds = cell(row, 'PubChem Compound Identifiers')
  const inchiKey = lookup.inchiKeyByInchi.get(inchi) ?? ''

  const chemblByPharmId = lookup.byPharmId.get(pharmId) ?? ''
  const chemblByPubchem = chemblForPubchem(pubchemCompoundIds, lookup)
  const chemblByInchi = inchiKey ? lookup.byInchiKey.get(inchiKey) ?? '' : ''

  return {
    pharmId,
    name: cell(row, 'Name'),
    genericNames: cell(row, 'Generic Names'),
    tradeNames: cell(row, 'Trade Names'),
    brandMixtures: cell(row, 'Brand Mixtures'),
    types: cell(row, 'Type'),
    crossReferences: cell(row, 'Cross-references'),
    smiles: cell(row, 'SMILES'),
    inchi,
    rxNormIds: cell(row, 'RxNorm Identifiers'),
    atcIds: cell(row, 'ATC Identifiers'),
    pubchemCompoundIds,
    inchiKey,
    chemblByPharmId,
    chemblByPubchem,
    chemblByInchi,
    chemblId: mergeChemblIds(chemblByPharmId, chemblByPubchem, chemblByInchi),
  }
}

/**
 * drugs.tsv rows followed by chemicals.tsv rows, one record per PharmGKB ID.
 * The first row seen for an ID is kept.
 */
export function buildDrugRecords(drugRows: Row[], chemicalRows: Row[], lookup: ChemblLookup): DrugRecord[] {
  const seen = new Set<string>()
  const records: DrugRecord[] = []
  for (const row of [...drugRows, ...chemicalRows]) {
    const pharmId = cell(row, 'PharmGKB Accession Id')
    if (!pharmId) {
      log.warn('drug row without a PharmGKB Accession Id skipped')
      continue
    }
    if (seen.has(pharmId)) {
      log.debug(`duplicate drug row for ${pharmId} ignored`)
      continue
    }
    seen.add(pharmId)
    records.push(toDrugRecord(row, lookup))
  }
  return records
}

export function toGeneRecord(row: Row): GeneRecord {
  return {
    pharmId: cell(row, 'PharmGKB Accession Id'),
    ncbiGeneIds: cell(row, 'NCBI Gene ID'),
    hgncIds: cell(row, 'HGNC ID'),
    ensemblIds: cell(row, 'Ensembl Id'),
    name: cell(row, 'Name'),
    symbol: cell(row, 'Symbol'),
    alternateNames: cell(row, 'Alternate Names'),
    alternateSymbols: cell(row, 'Alternate Symbols'),
    crossReferences: cell(row, 'Cross-references'),
  }
}

export function toRelationshipRecord(row: Row): RelationshipRecord {
  return {
    entity1Id: cell(row, 'Entity1_id'),
    entity1Name: cell(row, 'Entity1_name'),
    entity1Type: cell(row, 'Entity1_type'),
    entity2Id: cell(row, 'Entity2_id'),
    entity2Name: cell(row, 'Entity2_name'),
    entity2Type: cell(row, 'Entity2_type'),
    evidence: cell(row, 'Evidence'),
    association: cell(row, 'Association'),
    pk: cell(row, 'PK'),
    pd: cell(row, 'PD'),
    pmids: cell(row, 'PMIDs'),
  }
}

export interface SourceTables {
  drugs: DrugRecord[]
  genes: GeneRecord[]
  relations: RelationshipRecord[]
}

/** Read every table of a run from disk. */
export async function loadSourceTables(paths: WorkPaths): Promise<SourceTables> {
  const lookup = await loadChemblLookup(paths.conversion)
  const [drugRows, chemicalRows, geneRows, relationRows] = await Promise.all([
    readTsv(paths.tables.drugs, DRUG_COLUMNS),
    readTsv(paths.tables.chemicals, DRUG_COLUMNS),
    readTsv(paths.tables.genes, GENE_COLUMNS),
    readTsv(paths.tables.relationships, RELATION_COLUMNS),
  ])
  return {
    drugs: buildDrugRecords(drugRows, chemicalRows, lookup),
    genes: geneRows.map(toGeneRecord),
    relations: relationRows.map(toRelationshipRecord),
  }
}
