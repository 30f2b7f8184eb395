/**
 * Destination for finished report bodies, addressed by object name.
 */
export interface ReportSink {
  readonly description: string;
  exists(name: string): Promise<boolean>;
  write(name: string, body: string, contentType: string): Promise<void>;
  close?(): Promise<void>;
}
