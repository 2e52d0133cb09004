/**
 * HTTP Transport
 *
 * Lets a system under test live in another process. The server side wraps
 * any `SystemClient`; the client side implements `SystemClient` over
 * `fetch`, so the executor cannot tell the two apart.
 *
 * Routes:
 * - POST /advance                  { by }
 * - POST /fund                     { recipient, amount }
 * - POST /submit                   { operation } → SubmitResult
 * - GET  /storage
 * - GET  /balance/:handle
 * - GET  /entities/:handle/storage
 * - GET  /health
 */

import { createServer as createHttpServer } from "node:http"
import { CollaboratorFaultError, TransportError } from "./errors"
import { deserialize, serialize } from "./serialize"
import type { IncomingMessage, ServerResponse } from "node:http"
import type { SystemClient } from "./system"
import type {
  Balance,
  Expression,
  Handle,
  OperationEnvelope,
  RawFailure,
  SubmitResult,
} from "./types"

/**
 * Error response body.
 */
export interface ErrorResponse {
  error: string
  code: string
}

// =============================================================================
// Server
// =============================================================================

export interface SystemHttpHandlerOptions<Op extends OperationEnvelope, S> {
  client: SystemClient<Op, S>
  /** Validate an operation decoded from a request body */
  parseOperation: (value: unknown) => Op
}

/**
 * Create an HTTP request handler exposing a system client.
 */
export function createSystemHttpHandler<Op extends OperationEnvelope, S>(
  options: SystemHttpHandlerOptions<Op, S>
): (req: IncomingMessage, res: ServerResponse) => Promise<void> {
  const { client, parseOperation } = options

  return async function handler(req, res) {
    const url = new URL(req.url ?? `/`, `http://localhost`)
    const segments = url.pathname
      .split(`/`)
      .filter(Boolean)
      .map(decodeURIComponent)

    try {
      if (req.method === `GET`) {
        const [first, second, third] = segments
        if (first === `health` && segments.length === 1) {
          sendJson(res, 200, { status: `ok` })
          return
        }
        if (first === `storage` && segments.length === 1) {
          sendJson(res, 200, await client.getStorage())
          return
        }
        if (first === `balance` && second && segments.length === 2) {
          sendJson(res, 200, await client.getBalance(second))
          return
        }
        if (
          first === `entities` &&
          second &&
          third === `storage` &&
          segments.length === 3
        ) {
          sendJson(res, 200, await client.getEntityStorage(second))
          return
        }
      }

      if (req.method === `POST` && segments.length === 1) {
        let body: unknown
        try {
          body = deserialize(await readBody(req))
        } catch {
          sendJson(res, 400, {
            error: `Invalid JSON body`,
            code: `INVALID_JSON`,
          })
          return
        }

        switch (segments[0]) {
          case `advance`: {
            const by = field(body, `by`)
            if (typeof by !== `number` || !Number.isInteger(by) || by < 0) {
              sendJson(
                res,
                400,
                invalid(`'by' must be a non-negative integer`)
              )
              return
            }
            await client.advanceLevel(by)
            sendJson(res, 200, { ok: true })
            return
          }
          case `fund`: {
            const recipient = field(body, `recipient`)
            const amount = field(body, `amount`)
            if (typeof recipient !== `string` || typeof amount !== `bigint`) {
              sendJson(
                res,
                400,
                invalid(`'recipient' and 'amount' are required`)
              )
              return
            }
            await client.fund(recipient, amount)
            sendJson(res, 200, { ok: true })
            return
          }
          case `submit`: {
            let operation: Op
            try {
              operation = parseOperation(field(body, `operation`))
            } catch (err) {
              sendJson(
                res,
                400,
                invalid(err instanceof Error ? err.message : String(err))
              )
              return
            }
            sendJson(res, 200, await client.submit(operation))
            return
          }
        }
      }

      sendJson(res, 404, { error: `Not found`, code: `NOT_FOUND` })
    } catch (err) {
      if (err instanceof CollaboratorFaultError) {
        sendJson(res, 404, { error: err.message, code: err.code })
        return
      }
      throw err
    }
  }
}

export interface SystemServerOptions<Op extends OperationEnvelope, S>
  extends SystemHttpHandlerOptions<Op, S> {
  /**
   * Port to listen on.
   * @default 3000
   */
  port?: number
  /**
   * Host to bind to.
   * @default "localhost"
   */
  host?: string
}

/**
 * Create and start an HTTP server for a system client.
 */
export function createSystemServer<Op extends OperationEnvelope, S>(
  options: SystemServerOptions<Op, S>
): {
  server: ReturnType<typeof createHttpServer>
  close: () => Promise<void>
} {
  const { port = 3000, host = `localhost`, ...handlerOptions } = options
  const handler = createSystemHttpHandler(handlerOptions)

  const server = createHttpServer((req, res) => {
    handler(req, res).catch((err: unknown) => {
      console.error(`Unhandled error:`, err)
      if (!res.headersSent) {
        sendJson(res, 500, {
          error: `Internal server error`,
          code: `INTERNAL_ERROR`,
        })
      }
    })
  })

  server.listen(port, host)

  return {
    server,
    close: () =>
      new Promise((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()))
      }),
  }
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Array<Buffer> = []
    req.on(`data`, (chunk: Buffer) => chunks.push(chunk))
    req.on(`end`, () => resolve(Buffer.concat(chunks).toString(`utf-8`)))
    req.on(`error`, reject)
  })
}

function sendJson(res: ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { "Content-Type": `application/json` })
  res.end(serialize(data))
}

function invalid(error: string): ErrorResponse {
  return { error, code: `INVALID_REQUEST` }
}

function field(body: unknown, name: string): unknown {
  return typeof body === `object` && body !== null
    ? Reflect.get(body, name)
    : undefined
}

// =============================================================================
// Client
// =============================================================================

export interface HttpSystemClientOptions<S> {
  /** Base URL of a server created with `createSystemServer` */
  baseUrl: string
  /** Handle of the primary entity on the remote system */
  self: Handle
  /** Validate the primary storage decoded from a response */
  parseStorage: (value: unknown) => S
  /**
   * Per-request timeout. A timed-out submission reaches the normalizer as
   * a transport failure; any other timed-out call aborts the run as a
   * fault.
   */
  timeoutMs?: number
  fetch?: typeof fetch
}

/**
 * Create a system client that talks to a remote system over HTTP.
 */
export function createHttpSystemClient<Op extends OperationEnvelope, S>(
  options: HttpSystemClientOptions<S>
): SystemClient<Op, S> {
  const { self, parseStorage, timeoutMs } = options
  const baseUrl = options.baseUrl.replace(/\/+$/, ``)
  const fetchImpl = options.fetch ?? fetch

  async function request(
    method: `GET` | `POST`,
    path: string,
    body?: unknown,
    handle?: Handle
  ): Promise<unknown> {
    const url = `${baseUrl}${path}`
    const response = await fetchImpl(url, {
      method,
      headers:
        body === undefined ? undefined : { "Content-Type": `application/json` },
      body: body === undefined ? undefined : serialize(body),
      signal:
        timeoutMs === undefined ? undefined : AbortSignal.timeout(timeoutMs),
    })

    if (!response.ok) {
      const error = await TransportError.fromResponse(response, url)
      if (response.status === 404 && handle !== undefined) {
        throw CollaboratorFaultError.unresolvableHandle(handle, error)
      }
      throw error
    }
    return deserialize(await response.text())
  }

  return {
    self,

    async advanceLevel(by) {
      await request(`POST`, `/advance`, { by })
    },

    async fund(recipient, amount) {
      await request(`POST`, `/fund`, { recipient, amount })
    },

    async submit(op) {
      const result = await request(`POST`, `/submit`, { operation: op })
      if (!isSubmitResult(result)) {
        throw new TransportError(
          200,
          serialize(result),
          `${baseUrl}/submit`,
          `Malformed submit result from ${baseUrl}/submit`
        )
      }
      return result
    },

    async getStorage() {
      return parseStorage(await request(`GET`, `/storage`))
    },

    async getBalance(handle) {
      const balance = await request(
        `GET`,
        `/balance/${encodeURIComponent(handle)}`,
        undefined,
        handle
      )
      return toBalance(balance, handle)
    },

    async getEntityStorage(handle) {
      return request(
        `GET`,
        `/entities/${encodeURIComponent(handle)}/storage`,
        undefined,
        handle
      )
    },
  }
}

function toBalance(value: unknown, handle: Handle): Balance {
  if (typeof value === `bigint`) return value
  throw new TransportError(
    200,
    serialize(value),
    handle,
    `Balance of ${handle} is not an integer amount`
  )
}

// =============================================================================
// Response Validation
// =============================================================================

function isSubmitResult(value: unknown): value is SubmitResult {
  if (typeof value !== `object` || value === null) return false
  const ok: unknown = Reflect.get(value, `ok`)
  if (ok === true) return true
  return ok === false && isRawFailure(Reflect.get(value, `failure`))
}

function isRawFailure(value: unknown): value is RawFailure {
  if (typeof value !== `object` || value === null) return false
  switch (Reflect.get(value, `kind`)) {
    case `failwith`:
      return `value` in value
    case `expression`:
      return isExpression(Reflect.get(value, `expression`))
    case `transport`:
      return `error` in value
    default:
      return false
  }
}

function isExpression(value: unknown): value is Expression {
  if (Array.isArray(value)) return value.every(isExpression)
  if (typeof value !== `object` || value === null) return false
  for (const key of [`int`, `string`, `bytes`]) {
    if (typeof Reflect.get(value, key) === `string`) return true
  }
  if (typeof Reflect.get(value, `prim`) === `string`) {
    const args: unknown = Reflect.get(value, `args`)
    return args === undefined || (Array.isArray(args) && args.every(isExpression))
  }
  return false
}
