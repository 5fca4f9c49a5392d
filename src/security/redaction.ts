// Token-level patterns (API keys, JWTs); order matters, specific before generic
const TOKEN_PATTERNS: Array<{ pattern: RegExp; replacer: (match: string) => string }> = [
  { pattern: /eyJ[0-9A-Za-z_-]+\.[0-9A-Za-z_-]+\.[0-9A-Za-z_-]+/g, replacer: () => '<REDACTED_JWT>' },
  // Google API keys (Firebase, Maps, Gemini)
  { pattern: /AIza[0-9A-Za-z_-]{35}/g, replacer: () => 'AIza***REDACTED***' },
  // OAuth access tokens as logged by Play services
  { pattern: /ya29\.[0-9A-Za-z_-]{20,}/g, replacer: () => 'ya29.***REDACTED***' },
  { pattern: /sk-[A-Za-z0-9_-]{20,}/g, replacer: () => 'sk-***REDACTED***' },
  { pattern: /\bBearer\s+([A-Za-z0-9_.\-/+=]{20,})/g, replacer: () => 'Bearer <REDACTED>' },
];

// KEY=value and "key": "value" with sensitive key names
const KV_PATTERNS: Array<{ pattern: RegExp; replacement: string }> = [
  {
    pattern: /("(?:password|client_secret|secret_key|api_key|access_token|refresh_token|auth_token)")\s*:\s*"[^"]+"/gi,
    replacement: '$1: "<REDACTED>"',
  },
  {
    pattern: /\b([A-Za-z_]*(?:PASSWORD|PASSWD|SECRET|TOKEN|API_KEY|ACCESS_KEY)[A-Za-z_]*)=["']?([^"'\s,&]{6,})["']?/gi,
    replacement: '$1=<REDACTED>',
  },
];

// Mask credentials apps commonly leak into logcat
export function redact(input: string): string {
  let result = input;

  for (const { pattern, replacer } of TOKEN_PATTERNS) {
    result = result.replace(new RegExp(pattern.source, pattern.flags), replacer);
  }

  // Skip values the token pass already replaced
  for (const { pattern, replacement } of KV_PATTERNS) {
    result = result.replace(new RegExp(pattern.source, pattern.flags), (fullMatch: string) => {
      if (fullMatch.includes('REDACTED')) return fullMatch;
      return fullMatch.replace(new RegExp(pattern.source, pattern.flags), replacement);
    });
  }

  return result;
}

export function redactLines(lines: readonly string[]): string[] {
  return lines.map(redact);
}
