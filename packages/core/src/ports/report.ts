/** Append-only destination for benchmark reports. Never truncates earlier runs. */
export interface ReportSink {
  readonly location: string;
  append(lines: readonly string[]): Promise<void>;
}
