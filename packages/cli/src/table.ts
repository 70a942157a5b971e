import pc from 'picocolors';
import type { InflectionTrace } from 'pluralizer';

export type Output = {
  log(line: string): void;
  error(line: string): void;
};

const sourceColors = {
  empty: pc.gray,
  uncountable: pc.cyan,
  irregular: pc.magenta,
  rule: pc.yellow,
  identity: pc.gray
};

export function describeTrace(trace: InflectionTrace): string {
  if (trace.rule) {
    const { index, pattern, replacement } = trace.rule;
    return `rule #${index} /${pattern}/ -> "${replacement}"`;
  }
  if (trace.irregular) {
    const { singular, plural, kind } = trace.irregular;
    return kind === 'keep' ? `irregular ${singular}/${plural} (already ${trace.direction})` : `irregular ${singular}/${plural}`;
  }
  switch (trace.source) {
    case 'uncountable':
      return 'uncountable word';
    case 'empty':
      return 'empty input';
    default:
      return 'no rule matched';
  }
}

export function printTrace(trace: InflectionTrace, out: Output): void {
  const color = sourceColors[trace.source];
  out.log(`    ${color(trace.source.toUpperCase())} ${pc.dim(describeTrace(trace))}`);
}
