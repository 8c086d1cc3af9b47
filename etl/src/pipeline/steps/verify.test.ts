import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import { describe, it, expect } from 'vitest'
import { PipelineError } from '@pgx-graph/shared'
import { countOutput, splitBlocks, verifyOutput } from './verify.js'

const MCF = `Node: dcid:bio/hg19_ABC
typeOf: dcs:Gene

Node: dcid:bio/CHEMBL25
typeOf: dcs:Drug
name: "CHEMBL25"

`

describe('countOutput', () => {
  it('counts blocks by type', () => {
    expect(splitBlocks(MCF)).toHaveLength(2)
    expect(countOutput(MCF)).toEqual({ blocks: 2, byType: { 'dcs:Gene': 1, 'dcs:Drug': 1 } })
  })

  it('rejects a block without a Node line', () => {
    expect(() => countOutput('typeOf: dcs:Gene\n')).toThrow('block 1 does not start with a Node line: typeOf: dcs:Gene')
  })

  it('rejects a block without a type', () => {
    expect(() => countOutput('Node: dcid:x\nname: "x"\n')).toThrow(PipelineError)
  })
})

describe('verifyOutput', () => {
  it('compares the file with the conversion summary', () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'pgx-verify-')), 'out.mcf')
    fs.writeFileSync(file, MCF)
    try {
      expect(verifyOutput(file, { geneNodes: 1, drugNodes: 1, relationNodes: 0, skippedRelations: 0 }).blocks).toBe(2)
      expect(() => verifyOutput(file, { geneNodes: 2, drugNodes: 1, relationNodes: 0, skippedRelations: 0 })).toThrow(
        'output holds 2 node blocks, conversion wrote 3',
      )
    } finally {
      fs.rmSync(path.dirname(file), { recursive: true, force: true })
    }
  })
})
