export interface StructuredExtractionRequest {
  documentText: string;
  schemaDescription: string;
}

export interface StructuredExtractionPort {
  /** Returns the raw model answer; parsing and validation stay with the caller. */
  extract(request: StructuredExtractionRequest, options: { signal: AbortSignal }): Promise<string>;
}
