import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { makeExportBaselineCommand } from '../export-baseline'

describe('export-baseline command', () => {
  let tempDir: string
  let consoleErrorSpy: jest.SpyInstance

  beforeEach(async () => {
    tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'export-baseline-test-'))
    consoleErrorSpy = jest.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(async () => {
    consoleErrorSpy.mockRestore()
    await fs.promises.rm(tempDir, { recursive: true, force: true })
  })

  const writeEntry = async (entryName: string, definition: unknown): Promise<void> => {
    const fullPath = path.join(tempDir, 'archive', ...entryName.split('/'))
    await fs.promises.mkdir(path.dirname(fullPath), { recursive: true })
    await fs.promises.writeFile(fullPath, JSON.stringify(definition))
  }

  it('should write the method list of the archive in baseline format', async () => {
    await writeEntry('java/lang/Runnable.json', { kind: 'interface', methods: [{ name: 'run' }] })
    await writeEntry('java/util/RandomAccess.json', { kind: 'interface' })
    await writeEntry('java/util/Map.json', {
      kind: 'interface',
      methods: [{ name: 'put', parameters: ['java.lang.Object', 'java.lang.Object'], returns: 'java.lang.Object' }]
    })
    await writeEntry('java/util/Map$Entry.json', { kind: 'interface', methods: [{ name: 'getKey' }] })
    await writeEntry('com/sample/Widget.json', { kind: 'class', methods: [{ name: 'draw' }] })
    const outputPath = path.join(tempDir, 'baseline.txt')

    await makeExportBaselineCommand().parseAsync([
      'node', 'export-baseline', path.join(tempDir, 'archive'),
      '-o', outputPath,
      '--roots', 'java',
      '--dotenv', path.join(tempDir, '.env')
    ])

    expect(await fs.promises.readFile(outputPath, 'utf-8')).toBe([
      'java.lang.Runnable,run',
      'java.util.Map,put,java.lang.Object,java.lang.Object',
      'java.util.RandomAccess',
      ''
    ].join('\n'))
  })
})
