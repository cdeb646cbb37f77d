/**
 * Tests for the sops decryptor
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { SopsDecryptor, spawnCommand, type CommandRunner, type CommandResult } from '../../src/lib/sops.js'
import { DecryptionError } from '../../src/lib/errors.js'
import type { DecryptRequest } from '../../src/types.js'

const TOKEN = 'hvs.test-token-0001'
const KEY_URI = 'http://vault:8200/v1/sops/keys/first-key'

function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return {
    exitCode: 0,
    signal: null,
    stdout: Buffer.from(''),
    stderr: '',
    ...overrides
  }
}

describe('SopsDecryptor', () => {
  let root: string
  let request: DecryptRequest

  beforeEach(() => {
    root = join(tmpdir(), `secret-bootstrap-sops-${Date.now()}-${Math.random().toString(16).slice(2)}`)
    mkdirSync(root, { recursive: true })
    const encryptedFile = join(root, 'app-config-encrypted.ini')
    writeFileSync(encryptedFile, '[sops]\nhc_vault__list_0__map_vault_address = http://vault:8200\n')
    request = {
      token: { token: TOKEN },
      vaultAddr: 'http://vault:8200',
      keyUri: KEY_URI,
      encryptedFile
    }
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('should build the decrypt arguments', () => {
    const sops = new SopsDecryptor()
    expect(sops.buildArgs(KEY_URI, 'configs/in.ini')).toEqual([
      '--decrypt', '--hc-vault-transit', KEY_URI, 'configs/in.ini'
    ])
  })

  it('should add format flags when configured', () => {
    const sops = new SopsDecryptor({ inputType: 'ini', outputType: 'dotenv' })
    expect(sops.buildArgs(KEY_URI, 'in.ini')).toEqual([
      '--decrypt', '--hc-vault-transit', KEY_URI,
      '--input-type', 'ini', '--output-type', 'dotenv',
      'in.ini'
    ])
  })

  it('should return stdout and pass the token through the child env', async () => {
    const runner = vi.fn<CommandRunner>(async () => result({ stdout: Buffer.from('db_host=127.0.0.1\n') }))
    const sops = new SopsDecryptor({ runner, binary: '/usr/bin/sops', env: { PATH: '/usr/bin' } })

    const plaintext = await sops.decrypt(request)

    expect(plaintext.toString('utf-8')).toBe('db_host=127.0.0.1\n')
    expect(runner).toHaveBeenCalledTimes(1)
    const [command, args, options] = runner.mock.calls[0]
    expect(command).toBe('/usr/bin/sops')
    expect(args).toEqual(['--decrypt', '--hc-vault-transit', KEY_URI, request.encryptedFile])
    expect(options.env).toEqual({
      PATH: '/usr/bin',
      VAULT_ADDR: 'http://vault:8200',
      VAULT_TOKEN: TOKEN
    })
    expect(options.signal).toBeInstanceOf(AbortSignal)
  })

  it('should fail with DecryptionError on a non-zero exit, hiding the token', async () => {
    const runner = vi.fn<CommandRunner>(async () => result({
      exitCode: 128,
      stderr: `Failed to get the data key required to decrypt the SOPS file.\nError decrypting key: token ${TOKEN} permission denied\n`
    }))
    const sops = new SopsDecryptor({ runner })

    let caught: unknown
    try {
      await sops.decrypt(request)
    } catch (err) {
      caught = err
    }

    expect(caught).toBeInstanceOf(DecryptionError)
    expect(caught instanceof DecryptionError ? caught.message : '').toBe(
      'Decryption failed: sops exited with code 128: Error decrypting key: token hvs.****0001 permission denied'
    )
    expect(caught instanceof DecryptionError ? caught.context?.exitCode : undefined).toBe(128)
  })

  it('should report a bare exit code when stderr is empty', async () => {
    const runner = vi.fn<CommandRunner>(async () => result({ exitCode: 1 }))
    const sops = new SopsDecryptor({ runner })

    await expect(sops.decrypt(request)).rejects.toThrow('Decryption failed: sops exited with code 1')
  })

  it('should fail when sops is killed by a signal', async () => {
    const runner = vi.fn<CommandRunner>(async () => result({ exitCode: null, signal: 'SIGKILL' }))
    const sops = new SopsDecryptor({ runner })

    await expect(sops.decrypt(request)).rejects.toThrow('Decryption failed: sops was killed by SIGKILL')
  })

  it('should fail when the binary is missing', async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw Object.assign(new Error('spawn sops ENOENT'), { code: 'ENOENT' })
    })
    const sops = new SopsDecryptor({ runner })

    await expect(sops.decrypt(request)).rejects.toThrow('Decryption failed: sops binary not found: sops')
  })

  it('should fail and abort the child when sops hangs', async () => {
    const runner = vi.fn<CommandRunner>(() => new Promise<CommandResult>(() => {}))
    const sops = new SopsDecryptor({ runner, timeoutMs: 20 })

    await expect(sops.decrypt(request)).rejects.toThrow('Decryption failed: sops did not finish within 20ms')
    expect(runner.mock.calls[0][2].signal?.aborted).toBe(true)
  })

  it('should fail before running sops when the encrypted file is missing', async () => {
    const runner = vi.fn<CommandRunner>(async () => result())
    const sops = new SopsDecryptor({ runner })

    await expect(sops.decrypt({ ...request, encryptedFile: join(root, 'missing.ini') }))
      .rejects.toBeInstanceOf(DecryptionError)
    expect(runner).not.toHaveBeenCalled()
  })
})

describe('SopsDecryptor with spawnCommand', () => {
  let root: string
  let request: DecryptRequest

  // Executable stand-in for the sops binary
  const fakeSops = (name: string, body: string): string => {
    const file = join(root, name)
    writeFileSync(file, `#!/bin/sh\n${body}\n`, { mode: 0o755 })
    return file
  }

  const env = { PATH: process.env.PATH }

  beforeEach(() => {
    root = join(tmpdir(), `secret-bootstrap-spawn-${Date.now()}-${Math.random().toString(16).slice(2)}`)
    mkdirSync(root, { recursive: true })
    const encryptedFile = join(root, 'app-config-encrypted.ini')
    writeFileSync(encryptedFile, 'ENC[AES256_GCM,data:placeholder]\n')
    request = {
      token: { token: TOKEN },
      vaultAddr: 'http://vault:8200',
      keyUri: KEY_URI,
      encryptedFile
    }
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  it('should capture stdout byte for byte', async () => {
    const binary = fakeSops('sops-ok', `printf '[database]\\ndb_host=127.0.0.1\\n\\n[slack]\\nchannel=C000TEST\\n'`)
    const sops = new SopsDecryptor({ binary, env, runner: spawnCommand })

    const plaintext = await sops.decrypt(request)

    expect(plaintext.toString('utf-8')).toBe('[database]\ndb_host=127.0.0.1\n\n[slack]\nchannel=C000TEST\n')
  })

  it('should hand the Vault address and token to the child', async () => {
    const binary = fakeSops('sops-env', `printf '%s|%s|%s' "$VAULT_ADDR" "$VAULT_TOKEN" "$2"`)
    const sops = new SopsDecryptor({ binary, env, runner: spawnCommand })

    const plaintext = await sops.decrypt(request)

    expect(plaintext.toString('utf-8')).toBe(`http://vault:8200|${TOKEN}|--hc-vault-transit`)
  })

  it('should report a non-zero exit with the redacted stderr', async () => {
    const binary = fakeSops('sops-fail', 'echo "token $VAULT_TOKEN was denied" >&2\nexit 128')
    const sops = new SopsDecryptor({ binary, env, runner: spawnCommand })

    await expect(sops.decrypt(request))
      .rejects.toThrow('Decryption failed: sops exited with code 128: token hvs.****0001 was denied')
  })

  it('should kill a hanging child and report the timeout', async () => {
    const binary = fakeSops('sops-slow', 'exec sleep 5')
    const sops = new SopsDecryptor({ binary, env, runner: spawnCommand, timeoutMs: 100 })

    await expect(sops.decrypt(request)).rejects.toThrow('Decryption failed: sops did not finish within 100ms')
  })
})
