/**
 * Security Scanner - Static checks of agent spec content
 *
 * Each known security flag an agent declares is re-checked against the
 * string values in its spec. A spec may claim `noHardcodedSecrets: true`
 * and still carry an API key in its settings; the scanner catches that.
 *
 * @module registry/security-scanner
 */

import type { AgentSpec, KnownSecurityFlag } from '../types/schemas/agent-spec.js';
import { isRecord } from '../utils/object-helpers.js';

/**
 * A spec value that contradicts a declared security flag
 */
export interface SecurityFinding {
  flag: KnownSecurityFlag;
  path: string;
  detail: string;
}

const API_KEY_PATTERN = /\b(?:sk|pk)-[A-Za-z0-9_-]{8,}/;
const CREDENTIAL_KEY_PATTERN = /(?:password|passwd|secret|token|api[_-]?key)$/i;
const ENV_REFERENCE_PATTERN = /^\$\{?[A-Z][A-Z0-9_]*\}?$/;
const LOOPBACK_HOSTS = new Set(['localhost', '127.0.0.1', '[::1]']);

interface StringLeaf {
  path: string;
  key: string;
  value: string;
}

function collectStrings(value: unknown, path: string, key: string, out: StringLeaf[]): void {
  if (typeof value === 'string') {
    out.push({ path, key, value });
    return;
  }

  if (Array.isArray(value)) {
    value.forEach((item, index) => collectStrings(item, `${path}[${index}]`, key, out));
    return;
  }

  if (isRecord(value)) {
    for (const [childKey, child] of Object.entries(value)) {
      collectStrings(child, path ? `${path}.${childKey}` : childKey, childKey, out);
    }
  }
}

function checkHardcodedSecret(leaf: StringLeaf): string | undefined {
  if (API_KEY_PATTERN.test(leaf.value)) {
    return 'value looks like an API key';
  }

  if (
    CREDENTIAL_KEY_PATTERN.test(leaf.key) &&
    leaf.value.trim().length > 0 &&
    !ENV_REFERENCE_PATTERN.test(leaf.value.trim())
  ) {
    return `literal credential in "${leaf.key}" (use an environment reference)`;
  }

  return undefined;
}

function checkInsecureEndpoint(leaf: StringLeaf): string | undefined {
  if (!/^http:\/\//i.test(leaf.value)) {
    return undefined;
  }

  try {
    const url = new URL(leaf.value);
    return LOOPBACK_HOSTS.has(url.hostname) ? undefined : `plain HTTP endpoint ${url.host}`;
  } catch {
    return 'malformed plain HTTP endpoint';
  }
}

/**
 * Scan a spec for content that contradicts its known security flags
 *
 * The securityFlags block itself is not scanned.
 *
 * @returns Findings in spec order; empty when every flag holds
 */
export function scanSecurityFlags(spec: AgentSpec): SecurityFinding[] {
  const content = Object.fromEntries(
    Object.entries(spec).filter(([key]) => key !== 'securityFlags')
  );
  const leaves: StringLeaf[] = [];
  collectStrings(content, '', '', leaves);

  const findings: SecurityFinding[] = [];
  for (const leaf of leaves) {
    const secret = checkHardcodedSecret(leaf);
    if (secret) {
      findings.push({ flag: 'noHardcodedSecrets', path: leaf.path, detail: secret });
    }

    const endpoint = checkInsecureEndpoint(leaf);
    if (endpoint) {
      findings.push({ flag: 'noInsecureEndpoints', path: leaf.path, detail: endpoint });
    }
  }

  return findings;
}
