import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, it, expect } from 'vitest'
import { BatchFatalError } from '../../../src/import/import-error.js'
import { csvFileSource, csvTextSource, readCsvRows } from '../../../src/import/sources/csv-source.js'

function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}

describe('readCsvRows', () => {
  it('trims headers and cells and pads short rows', () => {
    const table = readCsvRows('\uFEFF Name , Email \n Ada ,ada@school.org\n\nGrace\n')

    expect(table).toEqual({
      columns: ['Name', 'Email'],
      rows: [
        { Name: 'Ada', Email: 'ada@school.org' },
        { Name: 'Grace', Email: '' },
      ],
    })
  })

  it('keeps commas and line breaks inside quotes', () => {
    const table = readCsvRows('Name,Notes\n"Bolt, Nut & Co","line one\nline two"\n')

    expect(table.rows).toEqual([{ Name: 'Bolt, Nut & Co', Notes: 'line one\nline two' }])
  })

  it('reads blank text as an empty table', () => {
    expect(readCsvRows('  \n ')).toEqual({ columns: [], rows: [] })
  })

  it('reads a header-only file as columns without rows', () => {
    expect(readCsvRows('Id,Name\n')).toEqual({ columns: ['Id', 'Name'], rows: [] })
  })

  it('fails as unreadable on an unterminated quote', () => {
    const error = thrownBy(() => readCsvRows('Name,Notes\nAda,"never closed\n'))

    expect(error).toBeInstanceOf(BatchFatalError)
    expect(error).toMatchObject({ failureKind: 'unreadable' })
  })
})

describe('csv sources', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'polaris-csv-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('reads text in memory', async () => {
    const source = csvTextSource('Id,Name\n001A,Acme\n', 'accounts.csv')

    expect(source.description).toBe('accounts.csv')
    expect((await source.read()).rows).toEqual([{ Id: '001A', Name: 'Acme' }])
  })

  it('reads a file and names the source after it', async () => {
    const path = join(dir, 'roster.csv')
    await writeFile(path, 'Teacher,Email\nAda Lovelace,ada@school.org\n', 'utf8')

    const source = csvFileSource(path)

    expect(source.description).toBe('roster.csv')
    expect(await source.read()).toEqual({
      columns: ['Teacher', 'Email'],
      rows: [{ Teacher: 'Ada Lovelace', Email: 'ada@school.org' }],
    })
  })

  it('rejects with the file system error when the file is missing', async () => {
    const source = csvFileSource(join(dir, 'missing.csv'))

    await expect(source.read()).rejects.toThrow(/ENOENT/)
  })
})
