import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest'
import { dirname, join } from 'path'
import { fileURLToPath, pathToFileURL } from 'url'
import { mkdtempSync, rmSync, existsSync, readFileSync, symlinkSync, writeFileSync } from 'fs'
import { tmpdir } from 'os'
import { createProgram, ExitCode, isMainModule } from './index.js'

const fixturesPath = join(dirname(fileURLToPath(import.meta.url)), '../core/config/__fixtures__')

describe('CLI Framework', () => {
  let mockExit: MockInstance<typeof process.exit>
  let mockConsoleInfo: MockInstance<typeof console.info>
  let mockConsoleError: MockInstance<typeof console.error>

  beforeEach(() => {
    mockExit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called')
    })
    mockConsoleInfo = vi.spyOn(console, 'info').mockImplementation(() => {})
    mockConsoleError = vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    mockExit.mockRestore()
    mockConsoleInfo.mockRestore()
    mockConsoleError.mockRestore()
  })

  describe('ExitCode', () => {
    it('should have correct exit codes', () => {
      expect(ExitCode.OK).toBe(0)
      expect(ExitCode.ERROR).toBe(1)
      expect(ExitCode.LEAKS).toBe(2)
    })
  })

  describe('createProgram', () => {
    it('should create a program with correct name', () => {
      const program = createProgram()

      expect(program.name()).toBe('leakfan')
    })

    it('should have version set', () => {
      const program = createProgram()

      expect(program.version()).toBe('1.0.0')
    })

    it('should have global options', () => {
      const program = createProgram()
      const optionNames = program.options.map(opt => opt.long)

      expect(optionNames).toContain('--verbose')
      expect(optionNames).toContain('--quiet')
      expect(optionNames).toContain('--config')
    })

    it('should have scan command', () => {
      const program = createProgram()
      const scanCmd = program.commands.find(cmd => cmd.name() === 'scan')

      expect(scanCmd).toBeDefined()
      expect(scanCmd?.description()).toContain('Scan')
    })

    it('should have init command', () => {
      const program = createProgram()
      const initCmd = program.commands.find(cmd => cmd.name() === 'init')

      expect(initCmd).toBeDefined()
      expect(initCmd?.description()).toContain('Generate')
    })

    it('should have validate command', () => {
      const program = createProgram()
      const validateCmd = program.commands.find(cmd => cmd.name() === 'validate')

      expect(validateCmd).toBeDefined()
      expect(validateCmd?.description()).toContain('Validate')
    })

    it('scan command should have source, filter and output options', () => {
      const program = createProgram()
      const scanCmd = program.commands.find(cmd => cmd.name() === 'scan')
      const options = scanCmd?.options.map(opt => opt.long)

      expect(options).toEqual(
        expect.arrayContaining([
          '--file',
          '--user',
          '--org',
          '--include',
          '--exclude',
          '--progress',
          '--workers',
          '--work-dir',
          '--output',
          '--format',
          '--fail-on-leaks'
        ])
      )
    })

    it('init command should have output option', () => {
      const program = createProgram()
      const initCmd = program.commands.find(cmd => cmd.name() === 'init')
      const options = initCmd?.options.map(opt => opt.long)

      expect(options).toContain('--output')
      expect(options).toContain('--force')
    })
  })

  describe('command execution', () => {
    it('should display version without error', async () => {
      const program = createProgram()
      program.exitOverride()
      program.configureOutput({ writeOut: () => {} })

      await expect(program.parseAsync(['node', 'leakfan', '--version'])).rejects.toThrow('1.0.0')
    })

    it('should reject a non-numeric worker cap', async () => {
      const program = createProgram()
      program.exitOverride()
      program.commands.forEach(cmd => cmd.exitOverride().configureOutput({ writeErr: () => {} }))

      await expect(
        program.parseAsync(['node', 'leakfan', 'scan', '--workers', 'many'])
      ).rejects.toThrow('Must be a positive integer.')
    })
  })

  describe('validate command', () => {
    it('should exit with OK (0) for valid config file', async () => {
      const program = createProgram()

      try {
        await program.parseAsync(['node', 'leakfan', 'validate', join(fixturesPath, 'valid-config.yaml')])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.OK)
      expect(mockConsoleInfo).toHaveBeenCalledWith(expect.stringContaining('Config file is valid'))
    })

    it('should exit with ERROR (1) for invalid config file', async () => {
      const program = createProgram()

      try {
        await program.parseAsync(['node', 'leakfan', 'validate', join(fixturesPath, 'invalid-config.yaml')])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.ERROR)
      expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining('Config file is invalid'))
      expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining('workers.max'))
    })

    it('should exit with ERROR (1) for non-existent config file', async () => {
      const program = createProgram()

      try {
        await program.parseAsync(['node', 'leakfan', 'validate', '/non-existent/leakfan.yaml'])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.ERROR)
      expect(mockConsoleError).toHaveBeenCalledWith(expect.stringContaining('ENOENT'))
    })

    it('should suppress output in quiet mode for valid config', async () => {
      const program = createProgram()

      try {
        await program.parseAsync([
          'node',
          'leakfan',
          '-q',
          'validate',
          join(fixturesPath, 'valid-config.yaml')
        ])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.OK)
      expect(mockConsoleInfo).not.toHaveBeenCalled()
    })
  })

  describe('init command', () => {
    let tempDir: string

    beforeEach(() => {
      tempDir = mkdtempSync(join(tmpdir(), 'leakfan-init-test-'))
    })

    afterEach(() => {
      rmSync(tempDir, { recursive: true, force: true })
    })

    it('should exit with OK (0) when creating new config file', async () => {
      const program = createProgram()
      const outputPath = join(tempDir, 'leakfan.yaml')

      try {
        await program.parseAsync(['node', 'leakfan', 'init', '-o', outputPath])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.OK)
      expect(existsSync(outputPath)).toBe(true)
    })

    it('should write the default configuration', async () => {
      const program = createProgram()
      const outputPath = join(tempDir, 'leakfan.yaml')

      try {
        await program.parseAsync(['node', 'leakfan', 'init', '-o', outputPath])
      } catch {
        // process.exit is mocked to throw
      }

      const content = readFileSync(outputPath, 'utf-8')
      expect(content).toContain('version: "1.0"')
      expect(content).toContain('workers:')
      expect(content).toContain('command: gitleaks')
    })

    it('should exit with ERROR (1) when file exists without force', async () => {
      const outputPath = join(tempDir, 'existing.yaml')

      try {
        await createProgram().parseAsync(['node', 'leakfan', 'init', '-o', outputPath])
      } catch {
        // Expected
      }

      mockExit.mockClear()
      try {
        await createProgram().parseAsync(['node', 'leakfan', 'init', '-o', outputPath])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.ERROR)
    })

    it('should exit with OK (0) when file exists with force flag', async () => {
      const outputPath = join(tempDir, 'existing.yaml')

      try {
        await createProgram().parseAsync(['node', 'leakfan', 'init', '-o', outputPath])
      } catch {
        // Expected
      }

      mockExit.mockClear()
      try {
        await createProgram().parseAsync(['node', 'leakfan', 'init', '-o', outputPath, '--force'])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.OK)
    })

    it('should log success message when creating config', async () => {
      const program = createProgram()
      const outputPath = join(tempDir, 'leakfan.yaml')

      try {
        await program.parseAsync(['node', 'leakfan', 'init', '-o', outputPath])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockConsoleInfo).toHaveBeenCalledWith(expect.stringContaining('Created config file'))
    })

    it('should suppress output in quiet mode', async () => {
      const program = createProgram()
      const outputPath = join(tempDir, 'quiet.yaml')

      try {
        await program.parseAsync(['node', 'leakfan', '-q', 'init', '-o', outputPath])
      } catch {
        // process.exit is mocked to throw
      }

      expect(mockExit).toHaveBeenCalledWith(ExitCode.OK)
      expect(existsSync(outputPath)).toBe(true)
      expect(mockConsoleInfo).not.toHaveBeenCalled()
    })
  })
})

describe('isMainModule', () => {
  let tempDir: string
  let script: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'leakfan-main-test-'))
    script = join(tempDir, 'index.js')
    writeFileSync(script, '')
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('should match the script run directly', () => {
    expect(isMainModule(pathToFileURL(script).href, script)).toBe(true)
  })

  it('should match the script run through an installed bin symlink', () => {
    const link = join(tempDir, 'leakfan')
    symlinkSync(script, link)

    expect(isMainModule(pathToFileURL(script).href, link)).toBe(true)
  })

  it('should not match another script', () => {
    const other = join(tempDir, 'other.js')
    writeFileSync(other, '')

    expect(isMainModule(pathToFileURL(script).href, other)).toBe(false)
  })

  it('should not match without a script path or for a missing file', () => {
    expect(isMainModule(pathToFileURL(script).href, '')).toBe(false)
    expect(isMainModule(pathToFileURL(script).href, join(tempDir, 'missing.js'))).toBe(false)
  })
})
