import * as Papa from 'papaparse';
import type { AnalysisResult } from './types';

export const RESULTS_FILE_NAME = 'analysis_results.csv';

const RESULT_FIELDS = ['Question', 'Answer', 'Timestamp'];

export class ResultsExporter {
  static toCsv(results: AnalysisResult[]): string {
    return Papa.unparse(
      {
        fields: RESULT_FIELDS,
        data: results.map(r => [r.question, r.answer, r.timestamp]),
      },
      {
        delimiter: ',',
        newline: '\n',
      }
    );
  }
}
