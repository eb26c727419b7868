import type { CounterDescriptor } from './types';

const UNIT_LABELS: Record<string, string> = {
  megaHertz: 'MHz',
  percent: '%',
  kiloBytes: 'KB',
  megaBytes: 'MB',
  kiloBytesPerSecond: 'KBps',
  megaBitsPerSecond: 'Mbps',
  millisecond: 'ms',
  microsecond: 'µs',
  second: 's',
  number: 'count',
  watt: 'W',
  joule: 'J',
};

export function unitLabel(unit: string): string {
  return UNIT_LABELS[unit] ?? unit;
}

/** `VM: web-01, cpu.usagemhz.average (MHz): 350` */
export function formatReportLine(entityName: string, value: number, counter: CounterDescriptor): string {
  return `VM: ${entityName}, ${counter.name} (${unitLabel(counter.unit)}): ${value}`;
}

export type ReportEmitter = (entityName: string, values: readonly number[], counter: CounterDescriptor) => void;

export function createReportEmitter(
  write: (line: string) => void = (line) => process.stdout.write(line),
): ReportEmitter {
  return (entityName, values, counter) => {
    for (const value of values) write(`${formatReportLine(entityName, value, counter)}\n`);
  };
}
