import { AnalysisFailure } from "../errors";
import { AnalysisEngine } from "./analysisEngine";
import { ExtractionResult, extractText } from "./pdfExtractor";

export interface DocumentPipeline {
  run(query: string, filePath: string, signal?: AbortSignal): Promise<string>;
}

/** Extract, verify, analyze. Shared by the worker and the synchronous endpoint. */
export class DocumentAnalyzer implements DocumentPipeline {
  constructor(
    private readonly engine: AnalysisEngine,
    private readonly extract: (filePath: string) => Promise<ExtractionResult> = extractText,
  ) {}

  async run(query: string, filePath: string, signal?: AbortSignal) {
    const extraction = await this.extract(filePath);
    if (extraction.kind === "not_found") {
      throw new AnalysisFailure(`File not found: ${extraction.path}`);
    }
    signal?.throwIfAborted();
    const verification = await this.engine.verify(extraction.text, signal);
    return this.engine.analyze(query, extraction.text, verification, signal);
  }
}
