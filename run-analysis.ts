#!/usr/bin/env node
import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { annotationsToJsonl, Corpus } from "./strata/document/corpus.js";
import { loadFramebook } from "./strata/framebook/loadFramebook.js";
import { StrataAnalyzer } from "./strata/runner/analyzeDocument.js";

export type CliArgs = {
  files: string[];
  jsonl: boolean;
  language: string;
  overlayPath?: string;
  framebookPath?: string;
};

export function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = { files: [], jsonl: false, language: "de" };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--jsonl") {
      parsed.jsonl = true;
    } else if (arg === "--language" && i + 1 < args.length) {
      parsed.language = args[i + 1];
      i++;
    } else if (arg === "--overlay" && i + 1 < args.length) {
      parsed.overlayPath = args[i + 1];
      i++;
    } else if (arg === "--framebook" && i + 1 < args.length) {
      parsed.framebookPath = args[i + 1];
      i++;
    } else if (arg.startsWith("--")) {
      throw new Error(`Unknown or incomplete option: ${arg}`);
    } else {
      parsed.files.push(arg);
    }
  }

  if (parsed.files.length === 0) {
    throw new Error(
      "Usage: strata-analyze <transcript.txt...> [--language de|en] [--overlay file] [--framebook file] [--jsonl]"
    );
  }
  return parsed;
}

export function assertLanguageSupported(language: string, supported: readonly string[]): void {
  if (!supported.includes(language)) {
    throw new Error(
      `Framebook has no patterns for language "${language}" (available: ${supported.join(", ")})`
    );
  }
}

function main() {
  const args = parseArgs(process.argv.slice(2));
  const { framebook } = loadFramebook({
    path: args.framebookPath,
    overlayPath: args.overlayPath,
  });
  const analyzer = new StrataAnalyzer(framebook);
  assertLanguageSupported(args.language, analyzer.languages());

  const corpus = new Corpus("cli");
  for (const file of args.files) {
    const raw = fs.readFileSync(file, "utf-8");
    corpus.add(
      analyzer.prepare(raw, {
        doc_id: path.basename(file, path.extname(file)),
        language: args.language,
      })
    );
  }

  const result = analyzer.analyzeCorpus(corpus);
  if (args.jsonl) {
    process.stdout.write(annotationsToJsonl(corpus.allAnnotations()) + "\n");
  } else {
    process.stdout.write(JSON.stringify(result, null, 2) + "\n");
  }
  if (result.failed.length > 0) process.exitCode = 1;
}

if (process.argv[1]) {
  const invokedPath = (() => {
    try {
      return new URL(`file://${process.argv[1]}`).href;
    } catch {
      return undefined;
    }
  })();
  if (invokedPath && invokedPath === import.meta.url) {
    try {
      main();
    } catch (err) {
      console.error(err);
      process.exit(1);
    }
  }
}
