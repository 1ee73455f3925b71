/**
 * Shared HTTP client for CLI commands.
 * Reads STEPWARDEN_PORT env var (default 19420) and optional STEPWARDEN_API_TOKEN.
 */
import http from 'http'

export type Json = Record<string, unknown>

export interface ApiResponse {
  statusCode: number
  data: Json
}

export function cliPort(): number {
  return parseInt(process.env.STEPWARDEN_PORT ?? '19420', 10)
}

export function cliApiBase(): string {
  return `http://127.0.0.1:${cliPort()}`
}

function buildHeaders(withBody: boolean): Record<string, string> {
  // Fastify rejects a JSON content-type with an empty body
  const headers: Record<string, string> = withBody ? { 'content-type': 'application/json' } : {}
  const token = process.env.STEPWARDEN_API_TOKEN
  if (token) headers['x-api-token'] = token
  return headers
}

function isJson(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function request(method: 'GET' | 'POST' | 'DELETE', path: string, body?: object): Promise<ApiResponse> {
  return new Promise((resolve, reject) => {
    const payload = body === undefined ? undefined : JSON.stringify(body)
    const req = http.request(
      cliApiBase() + path,
      { method, headers: buildHeaders(payload !== undefined) },
      (res) => {
        let raw = ''
        res.on('data', (c) => (raw += c))
        res.on('end', () => {
          let data: Json = { raw }
          try {
            const parsed: unknown = JSON.parse(raw)
            if (isJson(parsed)) data = parsed
          } catch {
            // non-JSON body stays under `raw`
          }
          resolve({ statusCode: res.statusCode ?? 0, data })
        })
      },
    )
    req.on('error', reject)
    if (payload !== undefined) req.write(payload)
    req.end()
  })
}

export function apiGet(path: string): Promise<ApiResponse> {
  return request('GET', path)
}

export function apiPost(path: string, body: object = {}): Promise<ApiResponse> {
  return request('POST', path, body)
}

export function apiDelete(path: string): Promise<ApiResponse> {
  return request('DELETE', path)
}

/** Print the daemon's error and exit when the call failed. */
export function exitOnError(res: ApiResponse): void {
  if (res.statusCode < 400) return
  const { error, message, field, constraint } = res.data
  console.error(
    'Error:',
    String(error ?? res.statusCode),
    field !== undefined ? `${String(field)} ${String(constraint ?? '')}` : String(message ?? ''),
  )
  process.exit(1)
}
