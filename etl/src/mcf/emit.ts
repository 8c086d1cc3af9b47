import {
  fillTemplate,
  type DrugRecord,
  type GeneRecord,
  type IdentifierMaps,
  type RelationshipRecord,
  type TemplateValues,
} from '@pgx-graph/shared'
import { log } from '../lib/log.js'
import {
  compoundType,
  formatBool,
  formatSemicolonList,
  formatTextList,
  translateEnums,
  translateXrefs,
} from './format.js'
import { drugDcid, geneDcids, relationDcid, relationName, stripDcidPrefix } from './identifiers.js'
import {
  ASSOCIATION_ENUMS,
  DRUG_TEMPLATE,
  DRUG_XREF_PROPS,
  EVIDENCE_ENUMS,
  GENE_TEMPLATE,
  GENE_XREF_PROPS,
  RELATION_TEMPLATE,
} from './schema.js'

// Cross-reference lines repeating a line already in the block are dropped.
function appendXrefs(block: string, xrefs: string): string {
  const seen = new Set(block.split('\n'))
  let out = block
  for (const line of xrefs.split('\n')) {
    if (!line || seen.has(line)) continue
    seen.add(line)
    out += line + '\n'
  }
  return out
}

export function geneMcf(gene: GeneRecord, dcid: string): string {
  const values: TemplateValues = {
    dcid,
    name: gene.name,
    symbol: gene.symbol,
    pharm_id: gene.pharmId,
    ncbi_ids: formatTextList(gene.ncbiGeneIds),
    hgnc_ids: formatTextList(gene.hgncIds),
    ensembl_ids: formatTextList(gene.ensemblIds),
    alt_symbols: formatTextList(gene.alternateSymbols),
  }
  return appendXrefs(fillTemplate(GENE_TEMPLATE, values), translateXrefs(gene.crossReferences, GENE_XREF_PROPS))
}

/** Two blocks per gene, one per genome build. Registers the gene's dcids in `maps.genes`. */
export function* emitGeneNodes(genes: Iterable<GeneRecord>, maps: IdentifierMaps): Generator<string> {
  for (const gene of genes) {
    const dcids = geneDcids(gene.symbol)
    if (dcids.length === 0) {
      log.warn(`gene ${gene.pharmId} has no symbol, no node written`)
      continue
    }
    maps.genes.set(gene.pharmId, dcids)
    for (const dcid of dcids) {
      yield geneMcf(gene, dcid)
    }
  }
}

export function drugMcf(drug: DrugRecord, dcid: string): string {
  const values: TemplateValues = {
    dcid,
    type: compoundType(drug.types),
    dc_name: stripDcidPrefix(dcid),
    name: drug.name,
    trade_names: formatTextList(drug.tradeNames),
    smiles: drug.smiles,
    inchi: drug.inchi,
    inchi_key: drug.inchiKey,
    pharm_id: drug.pharmId,
    rx_ids: formatTextList(drug.rxNormIds),
    atc_ids: formatTextList(drug.atcIds),
    pubchem_compound_ids: formatTextList(drug.pubchemCompoundIds),
  }
  return appendXrefs(fillTemplate(DRUG_TEMPLATE, values), translateXrefs(drug.crossReferences, DRUG_XREF_PROPS))
}

export function* emitDrugNodes(drugs: Iterable<DrugRecord>, maps: IdentifierMaps): Generator<string> {
  for (const drug of drugs) {
    const dcid = drugDcid(drug)
    maps.drugs.set(drug.pharmId, dcid)
    yield drugMcf(drug, dcid)
  }
}

export function relationMcf(relation: RelationshipRecord, drugDcid: string, geneDcid: string): string {
  const values: TemplateValues = {
    dcid: relationDcid(drugDcid, geneDcid),
    name: relationName(drugDcid, geneDcid),
    gene_dcid: geneDcid,
    drug_dcid: drugDcid,
    pubmed_ids: formatSemicolonList(relation.pmids),
    pk_bool: formatBool(relation.pk, 'PK'),
    pd_bool: formatBool(relation.pd, 'PD'),
    assoc_enums: translateEnums(relation.association, ASSOCIATION_ENUMS, 'association'),
    evid_enums: translateEnums(relation.evidence, EVIDENCE_ENUMS, 'evidence'),
  }
  return fillTemplate(RELATION_TEMPLATE, values)
}

/** PharmGKB IDs of the drug and gene of a Chemical/Gene row, in either column order. */
export function drugGeneEndpoints(relation: RelationshipRecord): { drug: string; gene: string } | undefined {
  const { entity1Type: t1, entity2Type: t2 } = relation
  if (t1 === 'Chemical' && t2 === 'Gene') return { drug: relation.entity1Id, gene: relation.entity2Id }
  if (t1 === 'Gene' && t2 === 'Chemical') return { drug: relation.entity2Id, gene: relation.entity1Id }
  return undefined
}

export interface RelationEmitOptions {
  onSkip?: (relation: RelationshipRecord, reason: string) => void
}

/**
 * One association block per gene dcid of each drug-gene row. Chemical/Gene
 * rows come first, then Gene/Chemical rows, each in file order. Rows between
 * other entity types are ignored; rows whose drug or gene was never emitted
 * are skipped with a warning.
 */
export function* emitRelationNodes(
  relations: Iterable<RelationshipRecord>,
  maps: IdentifierMaps,
  options: RelationEmitOptions = {},
): Generator<string> {
  const skip = (relation: RelationshipRecord, reason: string) => {
    log.warn(reason)
    options.onSkip?.(relation, reason)
  }

  function* blocks(relation: RelationshipRecord): Generator<string> {
    const endpoints = drugGeneEndpoints(relation)
    if (!endpoints) return

    const drug = maps.drugs.get(endpoints.drug)
    if (!drug) {
      skip(relation, `unrecognized drug pharm id: ${endpoints.drug}`)
      return
    }
    const genes = maps.genes.get(endpoints.gene)
    if (!genes) {
      skip(relation, `unrecognized gene pharm id: ${endpoints.gene}`)
      return
    }
    for (const gene of genes) {
      yield relationMcf(relation, drug, gene)
    }
  }

  const geneFirst: RelationshipRecord[] = []
  for (const relation of relations) {
    if (relation.entity1Type === 'Gene') {
      geneFirst.push(relation)
      continue
    }
    yield* blocks(relation)
  }
  for (const relation of geneFirst) {
    yield* blocks(relation)
  }
}
