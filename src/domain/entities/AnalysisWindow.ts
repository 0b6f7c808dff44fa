export interface AnalysisWindow {
  start: string; // ISO date, first day of a month
  end: string; // ISO date, last day of a month
}
