import { type RedactionStats } from '../types/redaction';

export interface ReportData {
  input: string;
  output: string;
  encoding: string;
  parameters: readonly string[];
  redactionString: string;
  stats: RedactionStats;
  startTime: Date;
  endTime: Date;
}

export interface Reporter {
  generate(data: ReportData): Promise<void>;
}
