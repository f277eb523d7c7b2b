import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { BaselineIndex } from '../../lib/baseline/baseline-index'
import { SurfaceAnalyser } from '../../lib/core/analyser'
import { SurfaceEventEmitter } from '../../lib/events'
import { SurfaceArchive } from '../../lib/surface/archive'
import { candidateTypeNames } from '../../lib/surface/candidates'
import { ArchiveTypeProvider } from '../../lib/surface/provider'
import { UnknownContractTypeError } from '../../lib/utils/errors'
import { buildScanReport, makeScanCommand, ScanReportRequest } from '../scan'

const CONSUMER = 'java.util.function.Consumer'
const SUPPLIER = 'java.util.function.Supplier'
const STREAM = 'java.util.stream.Stream'
const PARAMETER_TITLE = 'Methods that can use Lambda expressions for parameters'

const ENTRIES: Array<[string, unknown]> = [
  ['java/util/function/Consumer.json', {
    kind: 'interface',
    methods: [{ name: 'accept', parameters: ['java.lang.Object'] }]
  }],
  ['java/util/function/Supplier.json', {
    kind: 'interface',
    methods: [{ name: 'get', returns: 'java.lang.Object' }]
  }],
  ['java/util/List.json', {
    kind: 'interface',
    methods: [
      { name: 'forEach', parameters: [CONSUMER] },
      { name: 'stream', returns: STREAM },
      { name: 'size', returns: 'int' }
    ]
  }],
  ['java/util/stream/Stream.json', {
    kind: 'interface',
    methods: [
      { name: 'forEach', parameters: [CONSUMER] },
      { name: 'count', returns: 'long' },
      { name: 'generate', parameters: [SUPPLIER], returns: STREAM, modifiers: ['static'] }
    ]
  }],
  ['org/sample/Lazy.json', {
    kind: 'class',
    methods: [
      { name: 'of', parameters: [SUPPLIER], returns: 'org.sample.Lazy', modifiers: ['static'] },
      { name: 'get', returns: 'java.lang.Object' }
    ]
  }]
]

const BASELINE = [
  `java.util.List,forEach,${CONSUMER}`,
  'java.util.List,size',
  `${CONSUMER},accept,java.lang.Object`
]

const dashes = (text: string): string => '-'.repeat(text.length)
const equals = (text: string): string => '='.repeat(text.length)

describe('buildScanReport', () => {
  let analyser: SurfaceAnalyser
  let consoleErrorSpy: jest.SpyInstance

  const request = (overrides: Partial<ScanReportRequest>): ScanReportRequest => ({
    functional: [],
    printContractTypes: false,
    sources: false,
    markNew: false,
    newTypes: 'never',
    ...overrides
  })

  beforeEach(() => {
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {})

    const events = new SurfaceEventEmitter()
    const archive = new SurfaceArchive('memory', ENTRIES)
    analyser = new SurfaceAnalyser(
      BaselineIndex.fromLines(BASELINE, { events }),
      new ArchiveTypeProvider(archive),
      candidateTypeNames(archive.entryNames()),
      { events }
    )
  })

  afterEach(() => {
    consoleErrorSpy.mockRestore()
  })

  it('should report the whole surface', () => {
    const report = buildScanReport(analyser, request({
      printContractTypes: true,
      sources: true,
      markNew: true,
      excludeNamespace: 'java.util.stream'
    }))

    expect(report.split('\n')).toEqual([
      'Functional Interfaces',
      equals('Functional Interfaces'),
      '',
      CONSUMER,
      `${SUPPLIER} NEW`,
      '',
      PARAMETER_TITLE,
      equals(PARAMETER_TITLE),
      '',
      'java.util.List',
      dashes('java.util.List'),
      'forEach(Consumer)',
      '',
      'org.sample.Lazy',
      dashes('org.sample.Lazy'),
      'of(Supplier) NEW',
      '',
      'Stream sources',
      equals('Stream sources'),
      '',
      'java.util.List',
      dashes('java.util.List'),
      'stream() NEW',
      ''
    ])
  })

  it('should write one section per requested functional interface, in request order', () => {
    const report = buildScanReport(analyser, request({ functional: [SUPPLIER, CONSUMER] }))

    const supplierTitle = `${PARAMETER_TITLE} (${SUPPLIER})`
    const consumerTitle = `${PARAMETER_TITLE} (${CONSUMER})`
    expect(report.split('\n')).toEqual([
      supplierTitle,
      equals(supplierTitle),
      '',
      STREAM,
      dashes(STREAM),
      'generate(Supplier)',
      '',
      'org.sample.Lazy',
      dashes('org.sample.Lazy'),
      'of(Supplier)',
      '',
      consumerTitle,
      equals(consumerTitle),
      '',
      'java.util.List',
      dashes('java.util.List'),
      'forEach(Consumer)',
      '',
      STREAM,
      dashes(STREAM),
      'forEach(Consumer)',
      ''
    ])
  })

  it('should fail before writing anything when a requested type is not a functional interface', () => {
    expect(() => buildScanReport(analyser, request({ functional: [CONSUMER, 'java.util.List'] })))
      .toThrow(UnknownContractTypeError)
    expect(consoleErrorSpy).not.toHaveBeenCalled()
  })

  it('should analyse a single type and mark types missing from the baseline', () => {
    const report = buildScanReport(analyser, request({
      type: STREAM,
      sources: true,
      markNew: true,
      newTypes: 'absent'
    }))

    expect(report.split('\n')).toEqual([
      PARAMETER_TITLE,
      equals(PARAMETER_TITLE),
      '',
      `${STREAM} NEW`,
      dashes(STREAM),
      'forEach(Consumer) NEW',
      'generate(Supplier) NEW',
      '',
      'Stream sources',
      equals('Stream sources'),
      '',
      `${STREAM} NEW`,
      dashes(STREAM),
      'generate(Supplier) NEW',
      ''
    ])
  })
})

describe('scan command', () => {
  let tempDir: string
  let consoleErrorSpy: jest.SpyInstance

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'scan-command-test-'))
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    consoleErrorSpy.mockRestore()
    await fs.promises.rm(tempDir, { recursive: true, force: true })
  })

  it('should reject --functional together with --type', async () => {
    const command = makeScanCommand()
      .exitOverride()
      .configureOutput({ writeErr: () => {} })

    await expect(command.parseAsync(['node', 'scan', 'baseline.txt', 'archive', '-t', STREAM, '-f', CONSUMER]))
      .rejects.toMatchObject({ code: 'commander.conflictingOption' })
  })

  it('should write the report for a baseline file and an archive bundle', async () => {
    const baselinePath = path.join(tempDir, 'baseline.txt')
    const bundlePath = path.join(tempDir, 'surface.json')
    const outputPath = path.join(tempDir, 'report.txt')
    await fs.promises.writeFile(baselinePath, BASELINE.join('\n') + '\n')
    await fs.promises.writeFile(bundlePath, JSON.stringify({ entries: Object.fromEntries(ENTRIES) }))
    const configPath = path.join(tempDir, 'lambda-surface.config.yml')
    await fs.promises.writeFile(configPath, 'roots:\n  - java\n  - org\n')

    await makeScanCommand().parseAsync([
      'node', 'scan', baselinePath, bundlePath,
      '-f', SUPPLIER,
      '-n',
      '-o', outputPath,
      '--config', configPath,
      '--dotenv', path.join(tempDir, '.env')
    ])

    const report = await fs.promises.readFile(outputPath, 'utf-8')
    expect(report.split('\n').slice(3)).toEqual([
      STREAM,
      dashes(STREAM),
      'generate(Supplier) NEW',
      '',
      'org.sample.Lazy',
      dashes('org.sample.Lazy'),
      'of(Supplier) NEW',
      ''
    ])
  })

  describe('exit status', () => {
    let exitSpy: jest.SpyInstance

    beforeEach(() => {
      exitSpy = jest.spyOn(process, 'exit').mockImplementation((code) => {
        throw new Error(`process.exit(${code})`)
      })
    })

    afterEach(() => {
      exitSpy.mockRestore()
    })

    it('should exit with the I/O status when the baseline file is missing', async () => {
      const bundlePath = path.join(tempDir, 'surface.json')
      await fs.promises.writeFile(bundlePath, JSON.stringify({ entries: Object.fromEntries(ENTRIES) }))

      await expect(makeScanCommand().parseAsync([
        'node', 'scan', path.join(tempDir, 'missing.txt'), bundlePath,
        '-o', path.join(tempDir, 'report.txt'),
        '--dotenv', path.join(tempDir, '.env')
      ])).rejects.toThrow('process.exit(2)')

      expect(exitSpy).toHaveBeenCalledWith(2)
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining('Error:'),
        expect.stringContaining('Error with input or output:')
      )
    })

    it('should exit with the usage status for an unknown functional interface', async () => {
      const baselinePath = path.join(tempDir, 'baseline.txt')
      const bundlePath = path.join(tempDir, 'surface.json')
      const outputPath = path.join(tempDir, 'report.txt')
      await fs.promises.writeFile(baselinePath, BASELINE.join('\n') + '\n')
      await fs.promises.writeFile(bundlePath, JSON.stringify({ entries: Object.fromEntries(ENTRIES) }))

      await expect(makeScanCommand().parseAsync([
        'node', 'scan', baselinePath, bundlePath,
        '-f', 'java.util.List',
        '-o', outputPath,
        '--dotenv', path.join(tempDir, '.env')
      ])).rejects.toThrow('process.exit(1)')

      expect(exitSpy).toHaveBeenCalledWith(1)
      expect(fs.existsSync(outputPath)).toBe(false)
    })
  })
})
