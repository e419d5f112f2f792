export interface ReportSections<C, R, A = undefined> {
  configuration: C;
  results: R;
  /** Derived data (comparisons, metric statistics) kept apart from the raw results */
  analysis?: A;
}

export interface ResultDocument<C, R, A = undefined> extends ReportSections<C, R, A> {
  timestamp: string;
}

export interface ResultWriter {
  /**
   * Persist one report. Resolves to the path written.
   */
  write<C, R, A>(kind: string, sections: ReportSections<C, R, A>): Promise<string>;
}
