import { describe, expect, it } from 'vitest';
import { ResultsExporter } from './resultsExporter';

describe('ResultsExporter.toCsv', () => {
  it('writes one line per result under a fixed header', () => {
    const csv = ResultsExporter.toCsv([
      { question: 'What is the mean age?', answer: 'About 36, give or take', timestamp: '2024-01-01T10:00:00.000Z' },
      { question: 'Who is oldest?', answer: 'Grace "Amazing" Hopper', timestamp: '2024-01-01T10:05:00.000Z' },
    ]);

    expect(csv.split('\n')).toEqual([
      'Question,Answer,Timestamp',
      'What is the mean age?,"About 36, give or take",2024-01-01T10:00:00.000Z',
      'Who is oldest?,"Grace ""Amazing"" Hopper",2024-01-01T10:05:00.000Z',
    ]);
  });
});
