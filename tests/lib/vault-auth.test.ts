/**
 * Tests for the Vault Kubernetes authenticator
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { mkdirSync, rmSync, writeFileSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { KubernetesAuthenticator, readServiceAccountToken, type FetchLike } from '../../src/lib/vault-auth.js'
import { AuthenticationError, ConfigurationError, TransportError } from '../../src/lib/errors.js'

const JWT = 'test-service-account-jwt'

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' }
  })
}

const LOGIN_REPLY = {
  auth: {
    client_token: 'hvs.test-token-0001',
    accessor: 'test-accessor',
    lease_duration: 3600,
    renewable: true,
    policies: ['default', 'sops-decrypt']
  }
}

describe('vault-auth', () => {
  let root: string
  let jwtPath: string

  beforeEach(() => {
    root = join(tmpdir(), `secret-bootstrap-auth-${Date.now()}-${Math.random().toString(16).slice(2)}`)
    mkdirSync(root, { recursive: true })
    jwtPath = join(root, 'token')
    writeFileSync(jwtPath, `${JWT}\n`)
  })

  afterEach(() => {
    rmSync(root, { recursive: true, force: true })
  })

  describe('readServiceAccountToken', () => {
    it('should trim the trailing newline', async () => {
      await expect(readServiceAccountToken(jwtPath)).resolves.toBe(JWT)
    })

    it('should fail with ConfigurationError for a missing file', async () => {
      await expect(readServiceAccountToken(join(root, 'missing'))).rejects.toBeInstanceOf(ConfigurationError)
    })

    it('should fail with ConfigurationError for an empty file', async () => {
      const empty = join(root, 'empty')
      writeFileSync(empty, '\n')
      await expect(readServiceAccountToken(empty)).rejects.toThrow(`Service account token ${empty} is empty`)
    })

    it('should fail with ConfigurationError for a directory', async () => {
      await expect(readServiceAccountToken(root)).rejects.toBeInstanceOf(ConfigurationError)
    })
  })

  describe('KubernetesAuthenticator', () => {
    it('should post role and JWT to the login endpoint', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => jsonResponse(LOGIN_REPLY))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock })

      const token = await auth.login({ jwtPath, role: 'sops', vaultAddr: 'http://vault:8200' })

      expect(token).toEqual({
        token: 'hvs.test-token-0001',
        accessor: 'test-accessor',
        leaseDurationSeconds: 3600,
        renewable: true,
        policies: ['default', 'sops-decrypt']
      })

      expect(fetchMock).toHaveBeenCalledTimes(1)
      const [url, init] = fetchMock.mock.calls[0]
      expect(url).toBe('http://vault:8200/v1/auth/kubernetes/login')
      expect(init.method).toBe('POST')
      expect(JSON.parse(String(init.body))).toEqual({ role: 'sops', jwt: JWT })
      expect(init.headers).toEqual({
        'Content-Type': 'application/json',
        'X-Vault-Request': 'true'
      })
      expect(init.signal).toBeInstanceOf(AbortSignal)
    })

    it('should use a custom mount and namespace', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => jsonResponse(LOGIN_REPLY))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock, mount: 'k8s-prod', namespace: 'team-a' })

      await auth.login({ jwtPath, role: 'sops', vaultAddr: 'http://vault:8200/' })

      const [url, init] = fetchMock.mock.calls[0]
      expect(url).toBe('http://vault:8200/v1/auth/k8s-prod/login')
      expect(init.headers).toEqual({
        'Content-Type': 'application/json',
        'X-Vault-Request': 'true',
        'X-Vault-Namespace': 'team-a'
      })
    })

    it('should accept a reply with only the client token', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ auth: { client_token: 'hvs.minimal-0002', policies: null } }))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock })

      const token = await auth.login({ jwtPath, role: 'sops', vaultAddr: 'http://vault:8200' })
      expect(token.token).toBe('hvs.minimal-0002')
      expect(token.policies).toBeUndefined()
    })

    it('should not send anything when the JWT file is missing', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => jsonResponse(LOGIN_REPLY))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock })

      await expect(
        auth.login({ jwtPath: join(root, 'missing'), role: 'sops', vaultAddr: 'http://vault:8200' })
      ).rejects.toBeInstanceOf(ConfigurationError)
      expect(fetchMock).not.toHaveBeenCalled()
    })

    it('should map a rejected role to AuthenticationError with Vault errors', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ errors: ['invalid role name "nope"'] }, 400))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock })

      const promise = auth.login({ jwtPath, role: 'nope', vaultAddr: 'http://vault:8200' })
      await expect(promise).rejects.toBeInstanceOf(AuthenticationError)
      await expect(promise).rejects.toThrow('Vault login rejected for role "nope" (HTTP 400): invalid role name "nope"')
    })

    it('should map a non-JSON error page to AuthenticationError', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => new Response('<html>forbidden</html>', { status: 403 }))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock })

      await expect(auth.login({ jwtPath, role: 'sops', vaultAddr: 'http://vault:8200' }))
        .rejects.toThrow('Vault login rejected for role "sops" (HTTP 403)')
    })

    it('should treat a reply without auth.client_token as AuthenticationError', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ auth: null, warnings: ['no token'] }))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock })

      await expect(auth.login({ jwtPath, role: 'sops', vaultAddr: 'http://vault:8200' }))
        .rejects.toThrow('Vault login reply has no auth.client_token')
    })

    it('should treat an empty client token as AuthenticationError', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => jsonResponse({ auth: { client_token: '' } }))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock })

      await expect(auth.login({ jwtPath, role: 'sops', vaultAddr: 'http://vault:8200' }))
        .rejects.toBeInstanceOf(AuthenticationError)
    })

    it('should treat a non-JSON success reply as AuthenticationError', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => new Response('ok', { status: 200 }))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock })

      await expect(auth.login({ jwtPath, role: 'sops', vaultAddr: 'http://vault:8200' }))
        .rejects.toThrow('Vault login reply is not JSON (HTTP 200)')
    })

    it('should map network failures to TransportError', async () => {
      const fetchMock = vi.fn<FetchLike>(async () => {
        throw new TypeError('fetch failed', { cause: new Error('connect ECONNREFUSED 127.0.0.1:8200') })
      })
      const auth = new KubernetesAuthenticator({ fetch: fetchMock })

      const promise = auth.login({ jwtPath, role: 'sops', vaultAddr: 'http://127.0.0.1:8200' })
      await expect(promise).rejects.toBeInstanceOf(TransportError)
      await expect(promise).rejects.toThrow(
        'Cannot reach Vault at http://127.0.0.1:8200/v1/auth/kubernetes/login: fetch failed (connect ECONNREFUSED 127.0.0.1:8200)'
      )
    })

    it('should map a timeout to TransportError', async () => {
      const fetchMock = vi.fn<FetchLike>(() => new Promise<Response>(() => {}))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock, timeoutMs: 20 })

      await expect(auth.login({ jwtPath, role: 'sops', vaultAddr: 'http://vault:8200' }))
        .rejects.toThrow('Cannot reach Vault at http://vault:8200/v1/auth/kubernetes/login: Operation timed out after 20ms: vault login')
    })

    it('should time out when Vault stalls after sending the headers', async () => {
      const stalled = new ReadableStream<Uint8Array>({
        start(controller) {
          controller.enqueue(new TextEncoder().encode('{"auth":'))
        }
      })
      const fetchMock = vi.fn<FetchLike>(async () => new Response(stalled, { status: 200 }))
      const auth = new KubernetesAuthenticator({ fetch: fetchMock, timeoutMs: 50 })

      const promise = auth.login({ jwtPath, role: 'sops', vaultAddr: 'http://vault:8200' })
      await expect(promise).rejects.toBeInstanceOf(TransportError)
      await expect(promise).rejects.toThrow('Operation timed out after 50ms: vault login')
    })
  })
})
