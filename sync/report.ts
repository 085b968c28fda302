/**
 * Run Report
 *
 * Accumulates what a sync run did: how many translations were repaired, which
 * documents were dropped, and every finding reported along the way. One
 * instance is created per run and passed to the processing routines; under
 * GitHub Actions it is turned into a summary payload for the job.
 */

import { REPORT_MAX_CHARACTERS, REPORT_TRUNCATE_SUFFIX } from "./config";

export interface ReportPayload {
  status: string;
  summary: string;
  findings: string;
  removedDocuments: string;
}

export interface DocumentData {
  filename: string;
  langCode: string;
  messagesKept: number;
  translationsFixed: number;
  translationsCleared: number;
  findings: string[];
  removed: boolean;
}

export class RunReport {
  private documents: Map<string, DocumentData> = new Map();
  private errors: string[] = [];

  translationsFixed = 0;
  documentsRemoved = 0;
  hasErrors = false;

  private document(filename: string): DocumentData {
    let data = this.documents.get(filename);
    if (!data) {
      data = {
        filename,
        langCode: "",
        messagesKept: 0,
        translationsFixed: 0,
        translationsCleared: 0,
        findings: [],
        removed: false,
      };
      this.documents.set(filename, data);
    }
    return data;
  }

  logDocument(filename: string, data: Partial<DocumentData>): void {
    Object.assign(this.document(filename), data);
  }

  logFinding(filename: string, finding: string): void {
    this.document(filename).findings.push(finding);
  }

  /** Returns the running fix number. */
  recordFix(filename: string): number {
    this.document(filename).translationsFixed++;
    return ++this.translationsFixed;
  }

  recordIrreparable(filename: string): void {
    this.document(filename).translationsCleared++;
    this.hasErrors = true;
  }

  /** Returns the number of documents removed before this one. */
  recordRemoved(filename: string, messagesKept: number): number {
    this.logDocument(filename, { messagesKept, removed: true });
    return this.documentsRemoved++;
  }

  logError(error: string): void {
    this.errors.push(error);
    this.hasErrors = true;
  }

  getDocument(filename: string): DocumentData | undefined {
    return this.documents.get(filename);
  }

  private truncateText(
    text: string,
    maxLength: number = REPORT_MAX_CHARACTERS,
  ): string {
    const maxContentLength = maxLength - REPORT_TRUNCATE_SUFFIX.length;

    if (text.length <= maxLength) {
      return text;
    }

    return text.substring(0, maxContentLength) + REPORT_TRUNCATE_SUFFIX;
  }

  generatePayload(): ReportPayload {
    const entries = Array.from(this.documents.values());

    let status: string;
    if (this.errors.length > 0) {
      status = "🔴 Failed - Sync aborted";
    } else if (this.hasErrors) {
      status = "🟡 Warning - Some translations could not be fixed";
    } else {
      status = "🟢 Passed - All translations valid";
    }

    const cleared = entries.reduce((sum, d) => sum + d.translationsCleared, 0);
    let summary = `${entries.length} documents processed, ${this.translationsFixed} translations fixed, ${cleared} cleared, ${this.documentsRemoved} documents removed`;
    if (this.errors.length > 0) {
      summary += `\n\nErrors:\n${this.errors.join("\n")}`;
    }

    const findings = entries
      .filter((d) => d.findings.length > 0)
      .map((d) => `--- ${d.filename} ---\n${d.findings.join("\n")}`)
      .join("\n\n");

    const removedDocuments = entries
      .filter((d) => d.removed)
      .map((d) => `${d.filename} (${d.messagesKept} messages)`)
      .join("\n");

    return {
      status,
      summary: this.truncateText(summary),
      findings: this.truncateText(findings || "No findings"),
      removedDocuments: this.truncateText(removedDocuments || "None"),
    };
  }
}
