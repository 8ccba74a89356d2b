import { z } from 'zod'
import type { JsonValue } from './json.js'

/* Wire entities, named as the monitoring API expects them (snake_case). */

export interface OsInfo {
  name: string
  release: string
  architecture: string
}

export interface ServerInfo {
  ip: string
  timezone: string
  software?: string
  signature?: string
  protocol: string
  encoding?: string
  os: OsInfo
}

export interface LanguageInfo {
  name: string
  version: string
}

export interface RequestInfo {
  /** ISO-8601 UTC timestamp of request arrival. */
  timestamp: string
  ip: string
  url: string
  user_agent: string
  method: string
  headers: Record<string, string>
  body?: JsonValue
}

export interface ResponseInfo {
  headers: Record<string, string>
  code: number
  /** Body size in bytes. */
  size: number
  /** Seconds between request arrival and response departure. */
  load_time: number
  body?: JsonValue
}

export interface ErrorInfo {
  source: string
  type: string
  message: string
  file: string
  line: number
}

export interface PayloadData {
  server: ServerInfo
  language: LanguageInfo
  request: RequestInfo
  response: ResponseInfo
  errors: ErrorInfo[]
}

export interface TrebllePayload {
  api_key: string
  project_id: string
  version: number
  sdk: string
  data: PayloadData
}

/* Runtime guards for what adapters hand over. Bodies are not inspected. */

const headersSchema = z.record(z.string())
const bodySchema = z.custom<JsonValue>(() => true)

export const requestInfoSchema = z.object({
  timestamp: z.string().min(1),
  ip: z.string(),
  url: z.string().min(1),
  user_agent: z.string(),
  method: z.string().min(1),
  headers: headersSchema,
  body: bodySchema.optional()
})

export const responseInfoSchema = z.object({
  headers: headersSchema,
  code: z.number().int().min(0).max(999),
  size: z.number().nonnegative(),
  load_time: z.number().nonnegative(),
  body: bodySchema.optional()
})

export const errorInfoSchema = z.object({
  source: z.string(),
  type: z.string(),
  message: z.string(),
  file: z.string(),
  line: z.number().int()
})

export function emptyResponse(): ResponseInfo {
  return { headers: {}, code: 0, size: 0, load_time: 0 }
}
