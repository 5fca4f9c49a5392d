export interface CrashSignal {
  kind: 'fatal_exception' | 'anr' | 'process_died' | 'native_crash';
  process: string | null;
  line: string;
}

const MAX_SIGNALS = 10;

const CRASH_PATTERNS: Array<{ kind: CrashSignal['kind']; pattern: RegExp }> = [
  { kind: 'fatal_exception', pattern: /FATAL EXCEPTION/ },
  { kind: 'anr', pattern: /ANR in (\S+)/ },
  { kind: 'process_died', pattern: /Process (\S+) \(pid \d+\) has died/ },
  { kind: 'native_crash', pattern: /Fatal signal \d+/ },
];

// "Process: com.example.app, PID: 1234" follows FATAL EXCEPTION in AndroidRuntime output
const PROCESS_LINE = /Process: ([\w.]+), PID/;

// "com.example.shop:remote" is a process of com.example.shop; "com.example.shopping" is not
function belongsTo(process: string, targetPackage: string): boolean {
  return process === targetPackage || process.startsWith(`${targetPackage}:`);
}

export function detectCrashes(lines: readonly string[], targetPackage?: string): CrashSignal[] {
  const seen = new Set<string>();
  const signals: CrashSignal[] = [];

  for (let i = 0; i < lines.length; i++) {
    if (signals.length >= MAX_SIGNALS) break;
    const line = lines[i];

    for (const { kind, pattern } of CRASH_PATTERNS) {
      const match = line.match(pattern);
      if (!match) continue;

      let process: string | null = match[1] ?? null;
      if (kind === 'fatal_exception') {
        const next = lines.slice(i + 1, i + 3).map((l) => l.match(PROCESS_LINE)).find(Boolean);
        process = next ? next[1] : null;
      }
      // Routine background kills log the same line; only the app under test counts
      if (kind === 'process_died' && !(targetPackage && process && belongsTo(process, targetPackage))) break;
      if (targetPackage && process && !belongsTo(process, targetPackage)) break;

      const key = `${kind}:${process ?? ''}`;
      if (!seen.has(key)) {
        seen.add(key);
        signals.push({ kind, process, line: line.trim() });
      }
      break;
    }
  }

  return signals;
}

export function describeCrash(signal: CrashSignal): string {
  const label = signal.kind.replace('_', ' ');
  return signal.process ? `${label} in ${signal.process}` : label;
}
