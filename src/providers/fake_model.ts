import type { ReasoningClient, ReasoningRequest } from "./reasoning_client";

const LABEL_LINE = /^- \(([^()]+?, (?:\d{4}[a-z]{0,2}|n\.d\.(?:-[a-z]{1,2})?))\) (.+?)(?: \[|$)/gm;

type PromptSource = {
  label: string;
  title: string;
};

function promptField(prompt: string, field: string): string {
  // Best-effort: the analysis prompt puts each field on its own line.
  const line = prompt.split("\n").find((l) => l.startsWith(`${field}: `));
  return line ? line.slice(field.length + 2).trim() : "";
}

function promptSources(prompt: string): PromptSource[] {
  return [...prompt.matchAll(LABEL_LINE)].map((match) => ({
    label: match[1] ?? "",
    title: (match[2] ?? "").replace(/:$/, ""),
  }));
}

function fakeAnalysis(prompt: string): string {
  const title = promptField(prompt, "Title") || "the source";
  const excerpt = promptField(prompt, "Excerpt");
  return JSON.stringify({
    summary: `${title} reports findings relevant to the question. ${excerpt}`.trim(),
    key_points: [excerpt.split(/(?<=\.)\s/)[0] ?? title],
    methodology: "Not fully described in the excerpt.",
    limitations: ["Only the abstract excerpt was available."],
    relevance_score: 7,
    reasoning: "Deterministic stub analysis.",
  });
}

function fakeIntroduction(query: string, sources: PromptSource[]): string {
  const first = sources[0];
  const second = sources[1] ?? first;
  if (!first || !second) return `This essay examines ${query}.`;
  return [
    `This essay examines the question of ${query.replace(/[?.]$/, "")} and what the available evidence suggests.`,
    `Recent work indicates that the answer may depend on several interacting factors (${first.label}).`,
    `Moreover, studies reported so far appear to differ in method and scope (${second.label}).`,
    "The following sections review these findings, compare their approaches, and note the gaps that remain open for further research.",
  ].join(" ");
}

function fakeBody(sources: PromptSource[]): string {
  return sources
    .map(
      (source, index) =>
        `${index === 0 ? "The evidence" : "Furthermore, the evidence"} reported in ${source.title.toLowerCase()} suggests a measurable association that is consistent with the broader literature (${source.label}). ` +
        "However, the findings may be limited by sample composition and by the short observation windows used in the underlying studies."
    )
    .join("\n\n");
}

function fakeConclusion(sources: PromptSource[]): string {
  const last = sources.at(-1);
  return [
    "Taken together, the reviewed studies suggest a consistent but modest pattern across settings and methods.",
    last
      ? `Overall, the strongest findings appear in controlled designs, although replication is still needed (${last.label}).`
      : "Overall, replication is still needed.",
    "Future research should examine longer time frames and more diverse populations to settle the remaining questions.",
  ].join(" ");
}

/**
 * Deterministic stand-in for the reasoning model, used when the service runs
 * without credentials. Drafts cite every source listed in the prompt.
 */
export class FakeReasoningClient implements ReasoningClient {
  async complete(request: ReasoningRequest): Promise<string> {
    const query = promptField(request.prompt, "Research question");
    const sources = promptSources(request.prompt);

    switch (request.task) {
      case "source_analysis":
        return fakeAnalysis(request.prompt);
      case "draft_introduction":
        return fakeIntroduction(query, sources);
      case "draft_body":
        return fakeBody(sources);
      case "draft_conclusion":
        return fakeConclusion(sources);
      case "claim_verification":
        return JSON.stringify({
          verdict: "SUPPORTED",
          confidence: 0.8,
          evidence: promptField(request.prompt, "Excerpt"),
          reasoning: "Deterministic stub verdict.",
        });
    }
  }
}
