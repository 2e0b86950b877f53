export type CellValue = string | number | null;

export type ColumnType = 'integer' | 'float' | 'string';

export type DataSource = 'csv' | 'excel' | 'google-sheet';

export interface Dataset {
  originalName: string;
  source: DataSource;
  sheetName?: string;
  headers: string[];
  columnTypes: ColumnType[];
  data: CellValue[][];
  rowCount: number;
  columnCount: number;
  createdAt: Date;
}

export interface DatasetStats {
  columns: string[];
  rows: number;
  summary: string;
}

export interface NumericColumnSummary {
  column: string;
  count: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  p25: number | null;
  p50: number | null;
  p75: number | null;
  max: number | null;
}

export interface CategoricalColumnSummary {
  column: string;
  count: number;
  unique: number;
  top: string | null;
  freq: number;
}

export type DescribeResult =
  | { kind: 'numeric'; columns: NumericColumnSummary[] }
  | { kind: 'categorical'; columns: CategoricalColumnSummary[] };

export interface SearchResult {
  title: string;
  snippet: string;
  link: string;
}

export interface AnalysisResult {
  question: string;
  answer: string;
  timestamp: string;
}

export interface Session {
  id: string;
  dataset: Dataset;
  results: AnalysisResult[];
  createdAt: Date;
  lastAccessedAt: Date;
}

export interface QueryRequest {
  dataId: string;
  question: string;
  useWebSearch?: boolean;
  mainColumn?: string;
}

export interface QueryResponse {
  question: string;
  answer: string;
  timestamp: string;
  searchResults: SearchResult[];
  warnings: string[];
}

export interface HistogramBin {
  start: number;
  end: number;
  count: number;
}

export interface HistogramFigure {
  data: Array<{ type: 'histogram'; x: number[]; name: string }>;
  layout: {
    title: { text: string };
    xaxis: { title: { text: string } };
    yaxis: { title: { text: string } };
    bargap: number;
  };
}

export interface Histogram {
  column: string;
  bins: HistogramBin[];
  figure: HistogramFigure;
}
