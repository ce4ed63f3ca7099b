import type { Draft } from "../contracts/research";
import { DraftingExhaustedError } from "../errors/pipeline_errors";
import { countWords } from "../gates/text_metrics";
import type { Logger } from "../logging/logger";
import {
  callReasoning,
  requireText,
  type CallPolicy,
  type ReasoningClient,
  type ReasoningTask,
} from "../providers/reasoning_client";
import type { CitedSource } from "./cited_sources";

export type DraftSection = "introduction" | "body" | "conclusion";

const SECTION_TASK: Record<DraftSection, ReasoningTask> = {
  introduction: "draft_introduction",
  body: "draft_body",
  conclusion: "draft_conclusion",
};

const SECTION_SHARE: Record<DraftSection, number> = {
  introduction: 0.15,
  body: 0.7,
  conclusion: 0.15,
};

export type DraftRequest = {
  query: string;
  cited: CitedSource[];
  attempt: number;
  feedback: string[];
  targetWords: number;
};

function sourceBlock(cited: CitedSource[], detailed: boolean): string {
  return cited
    .map(({ label, source, analysis }) => {
      const header = `- (${label}) ${source.title} [${source.venue}]`;
      if (!detailed) return `${header}: ${analysis.summary}`;
      const points = analysis.keyPoints.map((point) => `    * ${point}`).join("\n");
      const limits = analysis.limitations.length ? `\n    limitations: ${analysis.limitations.join("; ")}` : "";
      return `${header}\n    summary: ${analysis.summary}\n    methodology: ${analysis.methodology}\n${points}${limits}`;
    })
    .join("\n");
}

function rules(request: DraftRequest): string[] {
  const lines = [
    "Write in an academic register. Hedge claims the evidence does not settle.",
    "Cite only the sources listed, exactly as (Lead, Year) using the labels shown, e.g. " +
      `(${request.cited[0]?.label ?? "Author, 2020"}).`,
    "Do not add headings or a reference list.",
  ];
  if (request.feedback.length) {
    lines.push(
      `This is revision ${request.attempt}. The previous draft failed review for these reasons; fix them:`,
      ...request.feedback.map((issue) => `  - ${issue}`)
    );
  }
  return lines;
}

export function buildSectionPrompt(
  section: DraftSection,
  request: DraftRequest,
  written: { introduction?: string; body?: string }
): string {
  const words = Math.round(request.targetWords * SECTION_SHARE[section]);
  const head = [`Research question: ${request.query}`, ""];

  if (section === "introduction") {
    return [
      ...head,
      `Write the introduction of a research essay (about ${words} words).`,
      "State the question, why it matters, and preview the themes in the sources.",
      ...rules(request),
      "",
      "Sources:",
      sourceBlock(request.cited, false),
    ].join("\n");
  }

  if (section === "body") {
    return [
      ...head,
      `Write the body of the essay (about ${words} words, several paragraphs separated by blank lines).`,
      "Synthesize themes, compare methodologies, and note contradictions and gaps.",
      "Cite every listed source at least once.",
      ...rules(request),
      "",
      `Introduction already written:\n${written.introduction ?? ""}`,
      "",
      "Sources:",
      sourceBlock(request.cited, true),
    ].join("\n");
  }

  return [
    ...head,
    `Write the conclusion of the essay (about ${words} words).`,
    "Summarize the main findings, their limits, and directions for further research.",
    ...rules(request),
    "",
    `Body already written:\n${written.body ?? ""}`,
    "",
    "Sources:",
    sourceBlock(request.cited, false),
  ].join("\n");
}

const LEADING_HEADING = /^\s*#{1,6}[^\n]*\n+/;

export function cleanSection(text: string): string {
  return text.replace(LEADING_HEADING, "").trim();
}

/**
 * Three sequential reasoning calls, each bounded and retried. A section that
 * exhausts its retries fails the whole draft.
 */
export async function writeDraft(args: {
  client: ReasoningClient;
  request: DraftRequest;
  policy: CallPolicy;
  signal?: AbortSignal;
  log?: Logger;
}): Promise<Draft> {
  const written: Partial<Record<DraftSection, string>> = {};

  for (const section of ["introduction", "body", "conclusion"] as const) {
    const task = SECTION_TASK[section];
    try {
      written[section] = await callReasoning({
        client: args.client,
        request: { task, prompt: buildSectionPrompt(section, args.request, written) },
        parse: (raw) => cleanSection(requireText(task, raw)),
        policy: args.policy,
        label: `draft ${section}`,
        signal: args.signal,
        log: args.log,
      });
    } catch (error) {
      throw new DraftingExhaustedError({
        section,
        attempt: args.request.attempt,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  const introduction = written.introduction ?? "";
  const body = written.body ?? "";
  const conclusion = written.conclusion ?? "";
  return {
    introduction,
    body,
    conclusion,
    citationsList: args.request.cited.map((cited) => cited.reference),
    wordCount: countWords([introduction, body, conclusion].join("\n\n")),
  };
}

export function renderEssayMarkdown(query: string, draft: Draft): string {
  return [
    `# ${query}`,
    "",
    "## Introduction",
    "",
    draft.introduction,
    "",
    "## Analysis and Findings",
    "",
    draft.body,
    "",
    "## Conclusion",
    "",
    draft.conclusion,
    "",
    "## References",
    "",
    ...draft.citationsList.map((entry) => `- ${entry}`),
    "",
  ].join("\n");
}
