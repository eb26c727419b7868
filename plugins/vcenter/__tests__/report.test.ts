import { describe, expect, it } from 'vitest';

import { createReportEmitter, formatReportLine, unitLabel } from '../report';

import type { CounterDescriptor } from '../types';

const cpu: CounterDescriptor = {
  key: 6,
  name: 'cpu.usagemhz.average',
  group: 'cpu',
  counter: 'usagemhz',
  rollupType: 'average',
  unit: 'megaHertz',
};

describe('report', () => {
  it('formats one line per vm and value', () => {
    expect(formatReportLine('web-01', 350, cpu)).toBe('VM: web-01, cpu.usagemhz.average (MHz): 350');
  });

  it('falls back to the raw unit key', () => {
    expect(unitLabel('percent')).toBe('%');
    expect(unitLabel('teraBytes')).toBe('teraBytes');
  });

  it('writes nothing for an empty sample', () => {
    const lines: string[] = [];
    const emit = createReportEmitter((line) => lines.push(line));

    emit('idle-01', [], cpu);
    emit('web-01', [0, 12], cpu);

    expect(lines).toEqual([
      'VM: web-01, cpu.usagemhz.average (MHz): 0\n',
      'VM: web-01, cpu.usagemhz.average (MHz): 12\n',
    ]);
  });
});
