import { z } from "zod";
import type { AgentConfig } from "../config/agentConfig.js";
import type { Deadline } from "../core/Deadline.js";
import {
  BackendError,
  ModelTransportError,
  RateLimitExhaustedError,
  ResolverUnavailableError,
} from "../errors/PipelineError.js";
import { callWithRetries } from "../llm/callWithRetries.js";
import type { StructuredModel } from "../llm/StructuredModel.js";
import type { UsageMeter } from "../llm/UsageMeter.js";
import type { PlatformClient } from "../platform/PlatformClient.js";
import type { ReferenceData } from "../platform/referenceData.js";
import type {
  ClarificationMarker,
  EntityCandidate,
  Logger,
  ResolutionResult,
  ResolvedEntity,
  Task,
  TextSpan,
  UnresolvedMention,
} from "../types/index.js";
import { EntityIndex } from "./EntityIndex.js";

const ID_PATTERN = /\b[a-z][a-z0-9]*_[a-z0-9_]*[a-z0-9]\b/gi;
const CAPITALIZED_RUN =
  /\b\p{Lu}[\p{L}\p{N}-]*(?:[’']s)?(?:\s+\p{Lu}[\p{L}\p{N}-]*(?:[’']s)?)*/gu;
const SELF_REFERENCE = /\b(?:me|my|myself|mine)\b|\bI\b|\bI['’](?:m|ve|d|ll)\b/i;

// 句首常见的大写词，不作为实体提及
const STOPWORDS = new Set([
  "a", "an", "the", "what", "who", "whom", "whose", "which", "where", "when",
  "why", "how", "is", "are", "was", "were", "do", "does", "did", "can",
  "could", "would", "should", "will", "please", "tell", "show", "list",
  "find", "give", "get", "update", "set", "change", "log", "add", "remove",
  "i", "we", "our", "my", "hi", "hello", "thanks", "project", "customer",
  "monday", "tuesday", "wednesday", "thursday", "friday", "saturday",
  "sunday", "today", "yesterday", "tomorrow",
]);

interface Mention {
  text: string;
  spans: TextSpan[];
  candidates: EntityCandidate[];
}

export interface EntityResolverOptions {
  platform: PlatformClient;
  reference: ReferenceData;
  model: StructuredModel;
  config: AgentConfig;
  logger?: Logger;
}

/**
 * Maps every entity-like mention in the task text to a directory id.
 * Deterministic levels first; a single constrained model call settles
 * whatever stays ambiguous.
 */
export class EntityResolver {
  private readonly logger: Logger;

  constructor(private readonly options: EntityResolverOptions) {
    this.logger = options.logger ?? console;
  }

  public async resolve(
    task: Task,
    deadline: Deadline,
    meter?: UsageMeter
  ): Promise<ResolutionResult> {
    const index = await this.loadIndex(deadline);
    const mentions = this.detectMentions(task.text, index);
    const isAboutCaller = !task.callerIsPublic && SELF_REFERENCE.test(task.text);

    const entities: ResolvedEntity[] = [];
    const unresolved: UnresolvedMention[] = [];
    const pending: Mention[] = [];

    for (const mention of mentions) {
      const [top, second] = mention.candidates;
      if (!top) {
        unresolved.push({
          mention: mention.text,
          reason: "no_match",
          candidates: [],
          spans: mention.spans,
        });
      } else if (!second || (top.score === 100 && second.score < 100)) {
        entities.push(toResolved(mention, top, top.level));
      } else {
        pending.push(mention);
      }
    }

    let modelCalls = 0;
    const ambiguous: Mention[] = [];
    if (pending.length > 0) {
      modelCalls = 1;
      const selections = await this.select(task, pending, deadline, meter);
      for (const mention of pending) {
        const chosenId = selections.get(mention.text.toLowerCase()) ?? null;
        const chosen = mention.candidates.find(
          (candidate) => candidate.id === chosenId
        );
        if (chosen) {
          entities.push(toResolved(mention, chosen, "model"));
          continue;
        }
        const [top, second] = mention.candidates;
        const tied = Boolean(top && second && top.score === second.score);
        if (tied) {
          ambiguous.push(mention);
        }
        unresolved.push({
          mention: mention.text,
          reason: tied ? "ambiguous" : "declined",
          candidates: mention.candidates,
          spans: mention.spans,
        });
      }
    }

    const clarification = buildClarification(ambiguous);
    this.logger.info("[EntityResolver] Resolved mentions", {
      taskId: task.taskId,
      resolved: entities.map((entity) => `${entity.kind}:${entity.id}`),
      unresolved: unresolved.map((item) => item.mention),
      clarification: clarification !== null,
      modelCalls,
    });
    return { entities, unresolved, clarification, isAboutCaller, modelCalls };
  }

  public detectMentions(text: string, index: EntityIndex): Mention[] {
    const { resolverMaxCandidates, resolverFuzzyThreshold } = this.options.config;
    const covered: TextSpan[] = [];
    const mentions = new Map<string, Mention>();
    const addMention = (
      raw: string,
      span: TextSpan,
      candidates: () => EntityCandidate[]
    ) => {
      covered.push(span);
      const key = raw.toLowerCase();
      const existing = mentions.get(key);
      if (existing) {
        existing.spans.push(span);
        return;
      }
      mentions.set(key, {
        text: raw,
        spans: [span],
        candidates: rankCandidates(candidates(), resolverMaxCandidates),
      });
    };

    for (const match of text.matchAll(ID_PATTERN)) {
      const start = match.index ?? 0;
      const raw = match[0];
      addMention(raw, { start, end: start + raw.length }, () => {
        const entry = index.findById(raw);
        return entry
          ? [{ kind: entry.kind, id: entry.id, name: entry.name, score: 100, level: "id" }]
          : [];
      });
    }

    const lower = text.toLowerCase();
    for (const phrase of index.phrases()) {
      let from = 0;
      for (;;) {
        const start = lower.indexOf(phrase, from);
        if (start < 0) break;
        const end = start + phrase.length;
        from = end;
        if (!isWordBoundary(lower, start, end) || overlaps(covered, start, end)) {
          continue;
        }
        addMention(text.slice(start, end), { start, end }, () =>
          index.exact(phrase)
        );
      }
    }

    for (const match of text.matchAll(CAPITALIZED_RUN)) {
      const matchStart = match.index ?? 0;
      for (const run of splitRun(match[0], matchStart)) {
        if (overlaps(covered, run.start, run.end)) continue;
        addMention(run.text, { start: run.start, end: run.end }, () => {
          const partial = index.partial(run.text);
          return partial.length > 0
            ? partial
            : index.fuzzy(run.text, resolverFuzzyThreshold);
        });
      }
    }

    return Array.from(mentions.values()).sort(
      (a, b) => (a.spans[0]?.start ?? 0) - (b.spans[0]?.start ?? 0)
    );
  }

  private async loadIndex(deadline: Deadline): Promise<EntityIndex> {
    try {
      const directory = await deadline.race(
        this.options.platform.directory(),
        "resolver"
      );
      return EntityIndex.build(directory, this.options.reference);
    } catch (error) {
      if (deadline.expired) throw error;
      throw new BackendError(
        "resolver",
        `Directory could not be loaded: ${
          error instanceof Error ? error.message : String(error)
        }`,
        error
      );
    }
  }

  private async select(
    task: Task,
    pending: Mention[],
    deadline: Deadline,
    meter?: UsageMeter
  ): Promise<Map<string, string | null>> {
    const allowed = new Map(
      pending.map((mention) => [
        mention.text.toLowerCase(),
        new Set(mention.candidates.map((candidate) => candidate.id)),
      ])
    );
    const schema = z
      .object({
        selections: z.array(
          z.object({
            mention: z.string(),
            id: z.string().nullable(),
            reason: z.string().optional(),
          })
        ),
      })
      .superRefine((value, ctx) => {
        value.selections.forEach((selection, position) => {
          const ids = allowed.get(selection.mention.toLowerCase());
          if (!ids) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["selections", position, "mention"],
              message: `Unknown mention "${selection.mention}"`,
            });
          } else if (selection.id !== null && !ids.has(selection.id)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: ["selections", position, "id"],
              message: `${selection.id} is not a candidate for "${selection.mention}"`,
            });
          }
        });
      });

    const { config } = this.options;
    try {
      const answer = await callWithRetries({
        model: this.options.model,
        request: {
          purpose: "resolver",
          schema,
          temperature: 0,
          messages: [
            {
              role: "system",
              content: [
                "You link mentions in a workplace request to directory records.",
                "For every mention pick exactly one candidate id, or null when the text does not make the choice clear.",
                "Never invent ids. Reply with JSON: {\"selections\":[{\"mention\":string,\"id\":string|null,\"reason\":string}]}",
              ].join("\n"),
            },
            {
              role: "user",
              content: [
                `Request: ${task.text}`,
                ...pending.map(
                  (mention) =>
                    `Mention "${mention.text}":\n${mention.candidates
                      .map(
                        (candidate) =>
                          `  - ${candidate.id} (${candidate.kind}) ${candidate.name} [score ${candidate.score}]`
                      )
                      .join("\n")}`
                ),
              ].join("\n"),
            },
          ],
        },
        policy: {
          maxSchemaRetries: config.maxSchemaRetries,
          maxTransportRetries: config.resolverMaxFailures - 1,
          retryBackoffMs: config.retryBackoffMs,
        },
        deadline,
        stage: "resolver",
        logger: this.logger,
        ...(meter ? { meter } : {}),
      });
      return new Map(
        answer.selections.map((selection) => [
          selection.mention.toLowerCase(),
          selection.id,
        ])
      );
    } catch (error) {
      if (
        error instanceof ModelTransportError ||
        error instanceof RateLimitExhaustedError
      ) {
        throw new ResolverUnavailableError(config.resolverMaxFailures, error);
      }
      throw error;
    }
  }
}

function toResolved(
  mention: Mention,
  candidate: EntityCandidate,
  via: ResolvedEntity["via"]
): ResolvedEntity {
  return {
    mention: mention.text,
    kind: candidate.kind,
    id: candidate.id,
    name: candidate.name,
    score: candidate.score,
    via,
    spans: mention.spans,
  };
}

function rankCandidates(
  candidates: EntityCandidate[],
  limit: number
): EntityCandidate[] {
  const unique = new Map<string, EntityCandidate>();
  for (const candidate of candidates) {
    const key = `${candidate.kind}:${candidate.id}`;
    const existing = unique.get(key);
    if (!existing || existing.score < candidate.score) {
      unique.set(key, candidate);
    }
  }
  return Array.from(unique.values())
    .sort((a, b) => b.score - a.score || a.id.localeCompare(b.id))
    .slice(0, limit);
}

function buildClarification(ambiguous: Mention[]): ClarificationMarker | null {
  if (ambiguous.length === 0) {
    return null;
  }
  const parts = ambiguous.map(
    (mention) =>
      `"${mention.text}" (${mention.candidates
        .map((candidate) => candidate.name)
        .join(", ")})`
  );
  return {
    mentions: ambiguous.map((mention) => mention.text),
    message: `Please clarify which one you mean: ${parts.join("; ")}.`,
  };
}

function isWordBoundary(text: string, start: number, end: number): boolean {
  const before = start > 0 ? text.charAt(start - 1) : "";
  const after = end < text.length ? text.charAt(end) : "";
  const word = /[\p{L}\p{N}_]/u;
  return !word.test(before) && !word.test(after);
}

function overlaps(spans: TextSpan[], start: number, end: number): boolean {
  return spans.some((span) => start < span.end && end > span.start);
}

interface Run {
  text: string;
  start: number;
  end: number;
}

/**
 * Splits a run of capitalized words on stopwords and strips possessive
 * suffixes, keeping absolute offsets.
 */
function splitRun(run: string, offset: number): Run[] {
  const runs: Run[] = [];
  let current: Run | null = null;
  for (const word of run.matchAll(/\S+/g)) {
    const wordStart = offset + (word.index ?? 0);
    const bare = word[0].replace(/[’']s$/, "");
    if (STOPWORDS.has(bare.toLowerCase())) {
      if (current) runs.push(current);
      current = null;
      continue;
    }
    const wordEnd = wordStart + bare.length;
    current = current
      ? { text: `${current.text} ${bare}`, start: current.start, end: wordEnd }
      : { text: bare, start: wordStart, end: wordEnd };
  }
  if (current) runs.push(current);
  return runs;
}
