// "- " lines appear only before, "+ " lines only after; counts matter
export function diffLines(before: string, after: string): string[] {
  const split = (text: string) => text.split('\n').map((l) => l.trim()).filter(Boolean);
  const beforeLines = split(before);
  const afterLines = split(after);

  const remaining = new Map<string, number>();
  for (const line of afterLines) {
    remaining.set(line, (remaining.get(line) ?? 0) + 1);
  }

  const removed: string[] = [];
  for (const line of beforeLines) {
    const count = remaining.get(line) ?? 0;
    if (count > 0) {
      remaining.set(line, count - 1);
    } else {
      removed.push(`- ${line}`);
    }
  }

  const consumed = new Map<string, number>();
  for (const line of beforeLines) {
    consumed.set(line, (consumed.get(line) ?? 0) + 1);
  }
  const added: string[] = [];
  for (const line of afterLines) {
    const count = consumed.get(line) ?? 0;
    if (count > 0) {
      consumed.set(line, count - 1);
    } else {
      added.push(`+ ${line}`);
    }
  }

  return [...removed, ...added];
}
