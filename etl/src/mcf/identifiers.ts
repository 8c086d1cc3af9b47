import type { DrugRecord } from '@pgx-graph/shared'
import { DCID_PREFIX, GENOME_BUILDS, RELATION_PREFIX } from './schema.js'

/**
 * Pick one ChEMBL ID for a drug. The ID mapped from the PharmGKB accession
 * wins, then the one from the PubChem compound ID, then the one from InChI.
 */
export function mergeChemblIds(
  byPharmId: string | undefined,
  byPubchem: string | undefined,
  byInchi: string | undefined,
): string | undefined {
  for (const candidate of [byPharmId, byPubchem, byInchi]) {
    if (candidate) return candidate
  }
  return undefined
}

/** `bio/<ChEMBL ID>`, or `bio/<PharmGKB ID>` when no ChEMBL ID was found. */
export function drugDcid(drug: Pick<DrugRecord, 'chemblId' | 'pharmId'>): string {
  return DCID_PREFIX + (drug.chemblId || drug.pharmId)
}

/** One dcid per genome build; none for a gene without a symbol. */
export function geneDcids(symbol: string): string[] {
  if (!symbol) return []
  return GENOME_BUILDS.map(build => `${DCID_PREFIX}${build}_${symbol}`)
}

export const stripDcidPrefix = (dcid: string) =>
  dcid.startsWith(DCID_PREFIX) ? dcid.slice(DCID_PREFIX.length) : dcid

/** Name of the association node between a drug and one gene build, e.g. `CGA_CHEMBL25_hg19_ABC`. */
export function relationName(drugDcid: string, geneDcid: string): string {
  return `${RELATION_PREFIX}${stripDcidPrefix(drugDcid)}_${stripDcidPrefix(geneDcid)}`
}

export function relationDcid(drugDcid: string, geneDcid: string): string {
  return DCID_PREFIX + relationName(drugDcid, geneDcid)
}
