import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { parseArgs, runCli, USAGE } from '../cli'
import type { CliIO } from '../cli'

const FIX44_XML = `<fix type="FIX" major="4" minor="4" servicepack="0">
  <fields>
    <field number="8" name="BeginString" type="STRING"/>
    <field number="35" name="MsgType" type="STRING">
      <value enum="D" description="ORDER_SINGLE"/>
    </field>
    <field number="54" name="Side" type="CHAR">
      <value enum="1" description="BUY"/>
    </field>
  </fields>
</fix>`

interface CapturedIO extends CliIO {
  out: string[]
  err: string[]
}

function captureIO(stdinText = ''): CapturedIO {
  const out: string[] = []
  const err: string[] = []
  return {
    stdin: Readable.from([stdinText]),
    write: (text) => { out.push(text) },
    writeError: (text) => { err.push(text) },
    out,
    err,
  }
}

describe('parseArgs', () => {
  it('reads the command, file and flags', () => {
    expect(parseArgs(['decode', 'in.log', '--json', '--config', 'c.json', '--separator', '--', '--strip-prefix'])).toEqual({
      command: 'decode',
      file: 'in.log',
      config: 'c.json',
      json: true,
      separator: '--',
      stripPrefix: true,
    })
  })

  it('rejects unknown options and missing values', () => {
    expect(() => parseArgs(['decode', '--verbose'])).toThrow('Unknown option: --verbose')
    expect(() => parseArgs(['decode', '--config'])).toThrow('--config needs a value')
  })
})

describe('runCli', () => {
  let dir: string
  let configPath: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'fixlog-cli-'))
    writeFileSync(join(dir, 'FIX44.xml'), FIX44_XML)
    configPath = join(dir, 'fixlog.config.json')
    writeFileSync(configPath, JSON.stringify({
      dictionaries: { 'FIX.4.4': 'FIX44.xml', 'FIX.5.0': 'missing.xml' },
      separator: '--',
    }))
    vi.spyOn(console, 'warn').mockImplementation(() => {})
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
    vi.restoreAllMocks()
  })

  it('decodes a file line by line with the configured separator', async () => {
    const logPath = join(dir, 'session.log')
    writeFileSync(logPath, ['8=FIX.4.4|35=D|54=1|', 'logon accepted', '8=FIX.4.4\x019999=5\x01'].join('\n'))
    const io = captureIO()

    const code = await runCli(['decode', logPath, '--config', configPath], io)

    expect(code).toBe(0)
    expect(io.out.join('')).toBe([
      '> BeginString[8] = [FIX.4.4]',
      '> MsgType[35] = ORDER_SINGLE[D]',
      '> Side[54] = BUY[1]',
      '--',
      '> BeginString[8] = [FIX.4.4]',
      '> [9999] = [5]',
      '--',
      '',
    ].join('\n'))
  })

  it('reads stdin and prints JSON with --json', async () => {
    const io = captureIO('noise 8=FIX.4.4|54=1|\n')

    const code = await runCli(['decode', '--config', configPath, '--json', '--strip-prefix'], io)

    expect(code).toBe(0)
    expect(io.out).toEqual([
      JSON.stringify([
        { tag: '8', value: 'FIX.4.4', tagName: 'BeginString' },
        { tag: '54', value: '1', tagName: 'Side', valueName: 'BUY' },
      ]) + '\n',
    ])
  })

  it('lists loaded versions and reports unavailable schemas', async () => {
    const io = captureIO()

    const code = await runCli(['versions', '--config', configPath], io)

    expect(code).toBe(2)
    expect(io.out).toEqual(['FIX.4.4\n'])
    expect(io.err).toHaveLength(1)
    expect(io.err[0]).toMatch(/^unavailable: Schema for FIX\.5\.0 is unavailable: /)
  })

  it('prints usage for an unknown command', async () => {
    const io = captureIO()
    expect(await runCli(['explain'], io)).toBe(1)
    expect(io.err).toEqual([USAGE + '\n'])
  })

  it('reports a missing config file', async () => {
    const io = captureIO()
    const missing = join(dir, 'nope.json')
    expect(await runCli(['versions', '--config', missing], io)).toBe(1)
    expect(io.err).toEqual([`fixlog: Config file not found: ${missing}\n`])
  })

  it('reports a missing input file', async () => {
    const io = captureIO()
    const missing = join(dir, 'nope.log')
    expect(await runCli(['decode', missing, '--config', configPath], io)).toBe(1)
    expect(io.err).toEqual([`fixlog: Input file not found: ${missing}\n`])
  })
})
