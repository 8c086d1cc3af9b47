import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest'
import { PipelineError } from '@pgx-graph/shared'
import {
  GENE_COLUMNS,
  buildDrugRecords,
  loadChemblLookup,
  toDrugRecord,
  toRelationshipRecord,
  type ChemblLookup,
} from './records.js'
import { readCsv, readTsv, toLookup } from './tables.js'

const lookup: ChemblLookup = {
  byPharmId: new Map([['PA1', 'CHEMBL1']]),
  byPubchemId: new Map([['2244', 'CHEMBL25']]),
  inchiKeyByInchi: new Map([['InChI=1S/X', 'KEYX']]),
  byInchiKey: new Map([['KEYX', 'CHEMBL9']]),
}

const drugRow = (overrides: Record<string, string>) => ({
  'PharmGKB Accession Id': '',
  'Name': '',
  'Type': 'Drug',
  'InChI': '',
  'PubChem Compound Identifiers': '',
  ...overrides,
})

describe('toDrugRecord', () => {
  it('collects all three ChEMBL candidates and keeps the PharmGKB one', () => {
    const drug = toDrugRecord(
      drugRow({ 'PharmGKB Accession Id': 'PA1', 'PubChem Compound Identifiers': '2244', 'InChI': 'InChI=1S/X' }),
      lookup,
    )
    expect(drug.chemblByPharmId).toBe('CHEMBL1')
    expect(drug.chemblByPubchem).toBe('CHEMBL25')
    expect(drug.chemblByInchi).toBe('CHEMBL9')
    expect(drug.inchiKey).toBe('KEYX')
    expect(drug.chemblId).toBe('CHEMBL1')
  })

  it('uses the first mapped PubChem compound of a list', () => {
    const drug = toDrugRecord(drugRow({ 'PharmGKB Accession Id': 'PA2', 'PubChem Compound Identifiers': '999, 2244' }), lookup)
    expect(drug.chemblId).toBe('CHEMBL25')
  })

  it('falls through to the InChI mapping', () => {
    const drug = toDrugRecord(drugRow({ 'PharmGKB Accession Id': 'PA3', 'InChI': 'InChI=1S/X' }), lookup)
    expect(drug.chemblId).toBe('CHEMBL9')
  })

  it('has no ChEMBL ID when nothing maps', () => {
    const drug = toDrugRecord(drugRow({ 'PharmGKB Accession Id': 'PA4' }), lookup)
    expect(drug.chemblId).toBeUndefined()
    expect(drug.inchiKey).toBe('')
  })
})

describe('buildDrugRecords', () => {
  it('keeps drugs before chemicals and the first row per PharmGKB ID', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    const records = buildDrugRecords(
      [drugRow({ 'PharmGKB Accession Id': 'PA1', 'Name': 'from drugs' })],
      [
        drugRow({ 'PharmGKB Accession Id': 'PA1', 'Name': 'from chemicals' }),
        drugRow({ 'PharmGKB Accession Id': 'PA5', 'Name': 'metabolite' }),
        drugRow({}),
      ],
      lookup,
    )
    expect(records.map(r => [r.pharmId, r.name])).toEqual([
      ['PA1', 'from drugs'],
      ['PA5', 'metabolite'],
    ])
  })
})

describe('toRelationshipRecord', () => {
  it('maps the relationships.tsv columns', () => {
    const record = toRelationshipRecord({
      Entity1_id: 'PA126',
      Entity1_name: 'CYP2C9',
      Entity1_type: 'Gene',
      Entity2_id: 'PA449053',
      Entity2_name: 'ibuprofen',
      Entity2_type: 'Chemical',
      Evidence: 'ClinicalAnnotation',
      Association: 'associated',
      PK: 'PK',
      PD: '',
      PMIDs: '111;222',
    })
    expect(record).toEqual({
      entity1Id: 'PA126',
      entity1Name: 'CYP2C9',
      entity1Type: 'Gene',
      entity2Id: 'PA449053',
      entity2Name: 'ibuprofen',
      entity2Type: 'Chemical',
      evidence: 'ClinicalAnnotation',
      association: 'associated',
      pk: 'PK',
      pd: '',
      pmids: '111;222',
    })
  })
})

describe('table readers', () => {
  let dir: string

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'pgx-tables-'))
  })

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true })
  })

  it('reads TSV cells with their literal quotes', async () => {
    const file = path.join(dir, 'drugs.tsv')
    fs.writeFileSync(file, 'PharmGKB Accession Id\tTrade Names\nPA1\tAspro,"Foo, Bar"\n')
    expect(await readTsv(file)).toEqual([{ 'PharmGKB Accession Id': 'PA1', 'Trade Names': 'Aspro,"Foo, Bar"' }])
  })

  it('reads CSV conversion tables with quoted InChI strings', async () => {
    const file = path.join(dir, 'inchi.csv')
    fs.writeFileSync(file, 'InChI,InChI Key\n"InChI=1S/C7H6O3/c8-6,9",KEY1\nInChI=1S/Y,\n')
    const lookup = toLookup(await readCsv(file), 'InChI', 'InChI Key')
    expect([...lookup]).toEqual([['InChI=1S/C7H6O3/c8-6,9', 'KEY1']])
  })

  it('rejects a missing table', async () => {
    await expect(readTsv(path.join(dir, 'absent.tsv'))).rejects.toThrow(PipelineError)
  })

  it('rejects a table without a required column', async () => {
    const file = path.join(dir, 'genes.tsv')
    fs.writeFileSync(file, 'PharmGKB Accession Id\tNCBI Gene ID\tHGNC ID\tEnsembl Id\tName\nPA128\t1565\t\t\tCYP2D6\n')
    await expect(readTsv(file, GENE_COLUMNS)).rejects.toThrow(`${file}: missing column Symbol`)
  })

  it('rejects a conversion table whose key column is misnamed', async () => {
    const write = (name: string, content: string) => {
      const file = path.join(dir, name)
      fs.writeFileSync(file, content)
      return file
    }
    const files = {
      pharmToChembl: write('pharm.csv', 'PharmGKB Accession Id,ChEMBL ID\nPA1,CHEMBL1\n'),
      pubchemToChembl: write('pubchem.csv', 'PubChem ID,ChEMBL ID\n2244,CHEMBL25\n'),
      inchiToInchiKey: write('inchi-key.csv', 'InChI,InChI Key\n'),
      inchiKeyToChembl: write('key-chembl.csv', 'InChI Key,ChEMBL ID\n'),
    }
    await expect(loadChemblLookup(files)).rejects.toThrow(`${files.pharmToChembl}: missing column PharmGKB ID`)
  })
})
