import { readFile } from 'node:fs/promises'
import { rootCertificates } from 'node:tls'
import type { Logger } from '../logger.js'

const PEM_BLOCK = /-----BEGIN CERTIFICATE-----[\s\S]+?-----END CERTIFICATE-----/g

/**
 * Trust anchors for outbound TLS: the certificates in the PEM file at
 * `rootCaPath` when it loads and holds at least one, otherwise the roots
 * bundled with Node.
 */
export async function loadRootCertificates(
  rootCaPath: string | undefined,
  logger?: Logger
): Promise<string[]> {
  if (!rootCaPath) {
    return [...rootCertificates]
  }
  try {
    const pem = await readFile(rootCaPath, 'utf8')
    const certificates = pem.match(PEM_BLOCK) ?? []
    if (certificates.length === 0) {
      logger?.warn({ rootCaPath }, 'No certificates in root CA file, using bundled roots')
      return [...rootCertificates]
    }
    return certificates
  } catch (err) {
    logger?.warn({ err, rootCaPath }, 'Failed to read root CA file, using bundled roots')
    return [...rootCertificates]
  }
}

const CERTIFICATE_ERROR_CODES = new Set([
  'CERT_HAS_EXPIRED',
  'CERT_NOT_YET_VALID',
  'CERT_REVOKED',
  'CERT_SIGNATURE_FAILURE',
  'CERT_UNTRUSTED',
  'DEPTH_ZERO_SELF_SIGNED_CERT',
  'ERR_TLS_CERT_ALTNAME_INVALID',
  'HOSTNAME_MISMATCH',
  'SELF_SIGNED_CERT_IN_CHAIN',
  'UNABLE_TO_GET_ISSUER_CERT',
  'UNABLE_TO_GET_ISSUER_CERT_LOCALLY',
  'UNABLE_TO_VERIFY_LEAF_SIGNATURE'
])

export function isCertificateErrorCode(code: string | undefined): boolean {
  return code !== undefined && CERTIFICATE_ERROR_CODES.has(code)
}

/** Reads `code` from an error, walking `cause` links. */
export function errorCode(error: unknown): string | undefined {
  let current: unknown = error
  for (let hops = 0; hops < 5 && current instanceof Error; hops++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code
    }
    current = current.cause
  }
  return undefined
}
