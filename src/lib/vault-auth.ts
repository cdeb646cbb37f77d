/**
 * Vault Kubernetes auth
 *
 * Exchanges the pod's service-account JWT for a Vault token:
 *
 *   POST {VAULT_ADDR}/v1/auth/{mount}/login
 *   {"role": "<role>", "jwt": "<service account token>"}
 *
 * The token is read from `auth.client_token` of the reply.
 */

import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import type { Authenticator, LoginRequest, VaultToken } from '../types.js'
import { AuthenticationError, ConfigurationError, TransportError, errorMessage } from './errors.js'
import { withTimeout } from './timeout.js'

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export interface KubernetesAuthenticatorOptions {
  /** Kubernetes auth mount point (default: kubernetes) */
  mount?: string
  /** Sent as X-Vault-Namespace when set */
  namespace?: string
  /** Login request deadline (default: 10000) */
  timeoutMs?: number
  /** HTTP client (default: global fetch) */
  fetch?: FetchLike
}

const loginResponseSchema = z.object({
  auth: z.object({
    client_token: z.string().min(1),
    accessor: z.string().optional(),
    lease_duration: z.number().optional(),
    renewable: z.boolean().optional(),
    policies: z.array(z.string()).nullish()
  })
})

const vaultErrorSchema = z.object({
  errors: z.array(z.string())
})

/**
 * Read the service-account JWT, trimming the trailing newline
 *
 * @throws ConfigurationError when the file is missing, unreadable or empty
 */
export async function readServiceAccountToken(jwtPath: string): Promise<string> {
  let content: string
  try {
    content = await readFile(jwtPath, 'utf-8')
  } catch (err) {
    throw new ConfigurationError(`Cannot read service account token ${jwtPath}: ${errorMessage(err)}`, {
      suggestion: 'Set JWT_PATH to the mounted token, e.g. /var/run/secrets/kubernetes.io/serviceaccount/token',
      context: { jwtPath },
      cause: err
    })
  }

  const jwt = content.trim()
  if (!jwt) {
    throw new ConfigurationError(`Service account token ${jwtPath} is empty`, {
      context: { jwtPath }
    })
  }
  return jwt
}

function describeFetchError(err: unknown): string {
  const message = errorMessage(err)
  // undici reports "fetch failed" and keeps the socket error as cause
  if (err instanceof Error && err.cause instanceof Error) {
    return `${message} (${err.cause.message})`
  }
  return message
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}

export class KubernetesAuthenticator implements Authenticator {
  private readonly mount: string
  private readonly namespace?: string
  private readonly timeoutMs: number
  private readonly fetchFn: FetchLike

  constructor(options: KubernetesAuthenticatorOptions = {}) {
    this.mount = options.mount ?? 'kubernetes'
    this.namespace = options.namespace
    this.timeoutMs = options.timeoutMs ?? 10_000
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init))
  }

  loginUrl(vaultAddr: string): string {
    return `${vaultAddr.replace(/\/+$/, '')}/v1/auth/${this.mount}/login`
  }

  async login(request: LoginRequest): Promise<VaultToken> {
    // JWT problems must surface before anything is sent
    const jwt = await readServiceAccountToken(request.jwtPath)
    const url = this.loginUrl(request.vaultAddr)

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Vault-Request': 'true'
    }
    if (this.namespace) {
      headers['X-Vault-Namespace'] = this.namespace
    }

    let status: number
    let ok: boolean
    let text: string
    try {
      // The deadline covers the body as well as the headers
      const response = await withTimeout(
        signal => this.fetchFn(url, {
          method: 'POST',
          headers,
          body: JSON.stringify({ role: request.role, jwt }),
          signal
        }).then(async (res) => ({ status: res.status, ok: res.ok, text: await res.text() })),
        this.timeoutMs,
        'vault login'
      )
      status = response.status
      ok = response.ok
      text = response.text
    } catch (err) {
      throw new TransportError(url, describeFetchError(err), err)
    }

    const body = parseJson(text)

    if (!ok) {
      const vaultErrors = vaultErrorSchema.safeParse(body)
      const detail = vaultErrors.success && vaultErrors.data.errors.length > 0
        ? `: ${vaultErrors.data.errors.join('; ')}`
        : ''
      throw new AuthenticationError(
        `Vault login rejected for role "${request.role}" (HTTP ${status})${detail}`,
        { status, role: request.role }
      )
    }

    const parsed = loginResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new AuthenticationError(
        body === undefined
          ? `Vault login reply is not JSON (HTTP ${status})`
          : 'Vault login reply has no auth.client_token',
        { status, role: request.role }
      )
    }

    const { auth } = parsed.data
    return {
      token: auth.client_token,
      accessor: auth.accessor,
      leaseDurationSeconds: auth.lease_duration,
      renewable: auth.renewable,
      policies: auth.policies ?? undefined
    }
  }
}
