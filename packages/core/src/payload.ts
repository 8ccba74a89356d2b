import { z } from 'zod'
import type { Config } from './config.js'
import { getEnvironmentFacts, type EnvironmentFacts } from './environment.js'
import { BuildError } from './errors.js'
import {
  emptyResponse,
  errorInfoSchema,
  requestInfoSchema,
  responseInfoSchema,
  type ErrorInfo,
  type RequestInfo,
  type ResponseInfo,
  type ServerInfo,
  type TrebllePayload
} from './schema.js'

export interface Observation {
  request: RequestInfo
  response?: ResponseInfo
  errors?: ErrorInfo[]
}

export interface PayloadBuilderOptions {
  /** Host facts; resolved once per process when omitted. */
  environment?: EnvironmentFacts
  /** Merged over the detected server facts, e.g. `{ software: 'hono' }`. */
  server?: Partial<ServerInfo>
}

const observationSchema = z.object({
  request: requestInfoSchema,
  response: responseInfoSchema.optional(),
  errors: z.array(errorInfoSchema).optional()
})

/**
 * Assembles the wire payload for one observation: masks headers and bodies,
 * attaches environment facts and credentials. Pure apart from the masking
 * walk; nothing here touches the network.
 */
export class PayloadBuilder {
  private readonly environment: EnvironmentFacts
  private readonly server: ServerInfo

  constructor(private readonly config: Config, options: PayloadBuilderOptions = {}) {
    this.environment = options.environment ?? getEnvironmentFacts()
    this.server = { ...this.environment.server, ...options.server }
  }

  build(observation: Observation): TrebllePayload {
    const parsed = observationSchema.safeParse(observation)
    if (!parsed.success) {
      throw new BuildError(missingFields(parsed.error))
    }

    const { request, response = emptyResponse(), errors = [] } = observation
    const masking = this.config.masking

    return {
      api_key: this.config.apiKey,
      project_id: this.config.projectId,
      version: this.environment.version,
      sdk: this.environment.sdk,
      data: {
        server: this.server,
        language: this.environment.language,
        request: {
          timestamp: request.timestamp,
          ip: request.ip,
          url: request.url,
          user_agent: request.user_agent,
          method: request.method,
          headers: masking.maskHeaders(request.headers),
          ...(request.body === undefined ? {} : { body: masking.mask(request.body) })
        },
        response: {
          headers: masking.maskHeaders(response.headers),
          code: response.code,
          size: response.size,
          load_time: response.load_time,
          ...(response.body === undefined ? {} : { body: masking.mask(response.body) })
        },
        errors: errors.map(error => ({ ...error }))
      }
    }
  }
}

function missingFields(error: z.ZodError): string[] {
  const fields = new Set<string>()
  for (const issue of error.issues) {
    fields.add(issue.path.length > 0 ? issue.path.join('.') : 'observation')
  }
  return [...fields]
}
