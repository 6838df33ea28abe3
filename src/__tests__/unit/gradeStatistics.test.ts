import { normalizeExtraction } from '../../core/recordNormalizer';
import type { RawTable, RosterEntry } from '../../core/types';
import { validateExtraction } from '../../middleware/extractionValidator';
import {
  computeGradeStatistics,
  formatPercent,
  gradeBand,
  levelOf,
  parsePercent,
} from '../../reports/gradeStatistics';
import { SAMPLE_PROFILE } from '../../test/fakes';

function roster(table: RawTable): readonly RosterEntry[] {
  const extraction = validateExtraction(
    table,
    { className: '7А', subject: 'Физика', periodLabel: '3 четверть', ...SAMPLE_PROFILE },
    { startYear: 2025 },
  );
  return normalizeExtraction(extraction, { period: '3' }).roster;
}

describe('gradeBand', () => {
  const entries = roster({
    headers: ['№', 'ФИО', 'Итог %', 'Оценка'],
    rows: [
      ['1', 'Абенова Айгерим', '40%', '5'],
      ['2', 'Борисов Иван', '85%', ''],
      ['3', 'Жумабаев Нурлан', '64,9 %', '7'],
      ['4', 'Ким Виктория', '39%', ''],
      ['5', 'Омаров Данияр', '', ''],
    ],
  });

  it('prefers a valid period grade over the percentage', () => {
    expect(gradeBand(entries[0])).toBe(5);
  });

  it('bands percentages at 85, 65 and 40', () => {
    expect(gradeBand(entries[1])).toBe(5);
    expect(gradeBand(entries[2])).toBe(3);
    expect(gradeBand(entries[3])).toBe(2);
  });

  it('leaves a student with neither unrated', () => {
    expect(gradeBand(entries[4])).toBeUndefined();
    expect(levelOf(undefined)).toBeUndefined();
  });

  it('groups bands into levels', () => {
    expect(levelOf(5)).toBe('high');
    expect(levelOf(4)).toBe('medium');
    expect(levelOf(3)).toBe('medium');
    expect(levelOf(2)).toBe('low');
  });
});

describe('computeGradeStatistics', () => {
  it('counts grades and keeps unrated students in the denominator', () => {
    const stats = computeGradeStatistics(
      roster({
        headers: ['№', 'ФИО', 'Оценка'],
        rows: [
          ['1', 'Абенова Айгерим', '5'],
          ['2', 'Борисов Иван', '4'],
          ['3', 'Жумабаев Нурлан', '3'],
          ['4', 'Ким Виктория', '2'],
          ['5', 'Омаров Данияр', ''],
        ],
      }),
    );

    expect(stats).toEqual({
      students: 5,
      counts: { 5: 1, 4: 1, 3: 1, 2: 1 },
      unrated: 1,
      qualityPercent: 40,
      successPercent: 60,
    });
  });

  it('reports zero rates for an empty class', () => {
    expect(computeGradeStatistics([])).toMatchObject({ students: 0, qualityPercent: 0, successPercent: 0 });
  });
});

describe('percent text', () => {
  it('parses and formats', () => {
    expect(parsePercent('92%')).toBe(92);
    expect(parsePercent('92,5 %')).toBe(92.5);
    expect(parsePercent('н/а')).toBeUndefined();
    expect(formatPercent(200 / 3)).toBe('66.67');
    expect(formatPercent(100)).toBe('100');
  });
});
