import path from 'path'
import { fileURLToPath } from 'url'
import { readFileSync, existsSync } from 'fs'

// Find workspace root by looking for a package.json with a "workspaces" field
const findWorkspaceRoot = (startDir: string): string => {
  let current = startDir
  while (current !== '/' && current !== '') {
    const packageJsonPath = path.join(current, 'package.json')
    if (existsSync(packageJsonPath)) {
      try {
        const pkg: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'))
        if (typeof pkg === 'object' && pkg !== null && 'workspaces' in pkg) {
          return current
        }
      } catch {
        // Unreadable manifest, keep walking up
      }
    }

    const parent = path.dirname(current)
    if (parent === current) break // Reached root
    current = parent
  }
  throw new Error('Workspace root not found')
}

const __dirname = path.dirname(fileURLToPath(import.meta.url))
const workspaceRoot = findWorkspaceRoot(__dirname)

export const SOURCE_TABLES = ['chemicals', 'drugs', 'genes', 'relationships'] as const
export type SourceTable = (typeof SOURCE_TABLES)[number]

export const PATHS = {
  workspaceRoot,
  workDir: 'data/pharmgkb',

  // Relative to the work dir
  rawData: 'raw_data',
  conversion: 'conversion',
  output: 'pharmgkb.mcf',

  conversionFiles: {
    pharmToChembl: 'pharm_id_to_chembl_combined.csv',
    pubchemToChembl: 'pubchem_id_to_chembl_combined.csv',
    inchiToInchiKey: 'inchi_to_inchi_key_combined.csv',
    inchiKeyToChembl: 'inchi_key_to_chembl_combined.csv',
  },
} as const

export interface WorkPaths {
  workDir: string
  rawData: string
  output: string
  tables: Record<SourceTable, string>
  conversion: {
    pharmToChembl: string
    pubchemToChembl: string
    inchiToInchiKey: string
    inchiKeyToChembl: string
  }
}

// Helper function to resolve paths relative to workspace root
export const resolvePath = (relativePath: string): string => {
  return path.join(workspaceRoot, relativePath)
}

/**
 * Absolute locations of every input and output of a run rooted at `workDir`.
 * Each archive extracts into `raw_data/<table>/` and holds `<table>.tsv`.
 */
export const resolveWorkPaths = (workDir: string, output: string = PATHS.output): WorkPaths => {
  const root = path.resolve(workDir)
  const rawData = path.join(root, PATHS.rawData)
  const conversionDir = path.join(root, PATHS.conversion)
  const table = (name: SourceTable) => path.join(rawData, name, `${name}.tsv`)
  return {
    workDir: root,
    rawData,
    output: path.resolve(root, output),
    tables: {
      chemicals: table('chemicals'),
      drugs: table('drugs'),
      genes: table('genes'),
      relationships: table('relationships'),
    },
    conversion: {
      pharmToChembl: path.join(conversionDir, PATHS.conversionFiles.pharmToChembl),
      pubchemToChembl: path.join(conversionDir, PATHS.conversionFiles.pubchemToChembl),
      inchiToInchiKey: path.join(conversionDir, PATHS.conversionFiles.inchiToInchiKey),
      inchiKeyToChembl: path.join(conversionDir, PATHS.conversionFiles.inchiKeyToChembl),
    },
  }
}
