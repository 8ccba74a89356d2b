import os from 'node:os'
import { PAYLOAD_VERSION, SDK_NAME, SDK_VERSION } from './constants.js'
import type { LanguageInfo, ServerInfo } from './schema.js'

/** Host facts that do not change over the life of the process. */
export interface EnvironmentFacts {
  readonly server: ServerInfo
  readonly language: LanguageInfo
  readonly sdk: string
  readonly version: number
}

let cached: EnvironmentFacts | undefined

/** Resolved on first use, then served from cache. */
export function getEnvironmentFacts(): EnvironmentFacts {
  cached ??= Object.freeze(resolveEnvironmentFacts())
  return cached
}

export function resolveEnvironmentFacts(): EnvironmentFacts {
  return {
    server: {
      ip: localIpAddress(),
      timezone: localTimezone(),
      protocol: 'HTTP/1.1',
      os: {
        name: os.platform(),
        release: os.release(),
        architecture: os.arch()
      }
    },
    language: {
      name: 'node',
      version: process.versions.node
    },
    sdk: `${SDK_NAME}-${SDK_VERSION}`,
    version: PAYLOAD_VERSION
  }
}

/** First non-internal IPv4 address, or "unknown". */
export function localIpAddress(
  interfaces: NodeJS.Dict<os.NetworkInterfaceInfo[]> = os.networkInterfaces()
): string {
  for (const addresses of Object.values(interfaces)) {
    for (const address of addresses ?? []) {
      if (address.family === 'IPv4' && !address.internal) {
        return address.address
      }
    }
  }
  return 'unknown'
}

function localTimezone(): string {
  return Intl.DateTimeFormat().resolvedOptions().timeZone || 'UTC'
}
