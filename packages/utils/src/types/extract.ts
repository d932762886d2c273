import type { OutputFormat } from "../constants.js";

export interface ExtractSection {
  /** 1-based position of the slide (or page) in the source document. */
  index: number;
  text: string;
}

export interface ExtractMetadata {
  format: string;
  sectionCount: number;
  title?: string;
  warnings?: string[];
  /** Original extension when the upload was converted before extraction. */
  convertedFrom?: string;
}

export interface ExtractResponse {
  filename: string;
  format: OutputFormat;
  text: string;
  sections: ExtractSection[];
  metadata: ExtractMetadata;
}
