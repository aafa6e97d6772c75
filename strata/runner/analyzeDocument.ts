import { strataLogHelpers } from "../../logging/strataLog.js";
import { PatternAnnotator } from "../annotate/patternAnnotator.js";
import { DiagnosticEntry, Diagnostics } from "../diagnostics/diagnostics.js";
import { ModuleId } from "../document/annotation.js";
import { Corpus } from "../document/corpus.js";
import { Document, DocumentSummary } from "../document/document.js";
import { prepareDocument, PrepareOptions } from "../document/prepareDocument.js";
import { Framebook } from "../framebook/framebook.schema.js";
import { resolveFrameRoles } from "../framebook/frameRoles.js";
import { PatternCatalog } from "../framebook/patternCatalog.js";
import { IntegrationReport, Integrator, AnalyticPasses } from "../integration/integrator.js";
import { JusticeEngine, JusticeReport } from "../justice/justiceEngine.js";
import {
  capabilityReport,
  CapabilityOptions,
  CapabilityRegistry,
} from "../language/languageCapabilities.js";
import { AffectPass } from "../passes/affectPass.js";
import { PassContext } from "../passes/analyticPass.js";
import { DiscoursePass } from "../passes/discoursePass.js";
import { NarrativePass } from "../passes/narrativePass.js";
import { PositionPass } from "../passes/positionPass.js";
import { SCORING_POLICY_V1, ScoringPolicyV1 } from "../policy/scoringPolicy.v1.js";

export type AnalysisReport = {
  document: DocumentSummary;
  capabilities: ReturnType<typeof capabilityReport>;
  passes: Record<ModuleId, number>;
  integration: IntegrationReport;
  justice: JusticeReport;
  diagnostics: DiagnosticEntry[];
};

export type CorpusReport = {
  corpus: string;
  reports: AnalysisReport[];
  failed: string[];
  diagnostics: DiagnosticEntry[];
};

export type AnalyzerOptions = {
  policy?: ScoringPolicyV1;
  capabilities?: CapabilityOptions;
};

/**
 * Wires the passes, integrator and justice engine around one framebook.
 * Diagnostics accumulate across every document the analyzer sees.
 */
export class StrataAnalyzer {
  readonly diagnostics = new Diagnostics();
  readonly context: PassContext;
  readonly passes: AnalyticPasses;
  readonly integrator: Integrator;
  readonly justice: JusticeEngine;

  constructor(framebook: Framebook, options: AnalyzerOptions = {}) {
    const policy = options.policy ?? SCORING_POLICY_V1;
    const catalog = new PatternCatalog(framebook, this.diagnostics);
    this.context = {
      annotator: new PatternAnnotator(this.diagnostics),
      catalog,
      diagnostics: this.diagnostics,
      capabilities: new CapabilityRegistry(options.capabilities),
      policy,
    };
    this.passes = {
      narrative: new NarrativePass(this.context),
      position: new PositionPass(this.context),
      discourse: new DiscoursePass(this.context),
      affect: new AffectPass(this.context),
    };
    this.integrator = new Integrator(this.passes, catalog, policy);
    this.justice = new JusticeEngine(this.passes, resolveFrameRoles(framebook), policy.justice);
  }

  /** Languages the framebook has patterns for. */
  languages(): string[] {
    return this.context.catalog.languages();
  }

  /** Prepares a transcript with the sentence segmenter probed for its language. */
  prepare(rawText: string, options: Omit<PrepareOptions, "capabilities"> = {}): Document {
    const language = options.language ?? "de";
    return prepareDocument(rawText, {
      ...options,
      language,
      capabilities: this.context.capabilities.for(language),
    });
  }

  /**
   * Runs every pass once. Passes already run on this document are skipped,
   * so a second call appends nothing.
   */
  annotate(document: Document): Record<ModuleId, number> {
    const counts: Record<ModuleId, number> = { narrative: 0, position: 0, discourse: 0, affect: 0 };
    for (const pass of Object.values(this.passes)) {
      if (document.getAnnotations({ module: pass.module }).length > 0) continue;
      const startTime = Date.now();
      const added = pass.analyze(document);
      counts[pass.module] = added;
      strataLogHelpers.passCompleted({
        doc_id: document.doc_id,
        module: pass.module,
        annotation_count: added,
        duration_ms: Date.now() - startTime,
      });
    }
    return counts;
  }

  analyzeDocument(document: Document): AnalysisReport {
    const startTime = Date.now();
    const before = this.diagnostics.size;
    const passes = this.annotate(document);
    const report: AnalysisReport = {
      document: document.summary(),
      capabilities: capabilityReport(this.context.capabilities.for(document.language)),
      passes,
      integration: this.integrator.report(document),
      justice: this.justice.report(document),
      diagnostics: this.diagnostics.entries().slice(before),
    };
    strataLogHelpers.analysisCompleted({
      doc_id: document.doc_id,
      annotation_count: document.annotationCount,
      duration_ms: Date.now() - startTime,
    });
    return report;
  }

  analyzeCorpus(corpus: Corpus): CorpusReport {
    const reports: AnalysisReport[] = [];
    const failed: string[] = [];
    for (const document of corpus.list()) {
      try {
        reports.push(this.analyzeDocument(document));
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        failed.push(document.doc_id);
        this.diagnostics.warn({ code: "document_failed", message, doc_id: document.doc_id });
        strataLogHelpers.analysisFailed({ doc_id: document.doc_id, message });
      }
    }
    return {
      corpus: corpus.name,
      reports,
      failed,
      diagnostics: this.diagnostics.entries(),
    };
  }
}
