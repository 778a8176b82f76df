import type { DirectorySnapshot } from "../platform/PlatformClient.js";
import type { ReferenceData } from "../platform/referenceData.js";
import type { EntityCandidate, EntityKind } from "../types/index.js";
import { ratio, tokenSetRatio, tokenize } from "./similarity.js";

export interface IndexEntry {
  kind: EntityKind;
  id: string;
  name: string;
  /** 名称与别名的小写形式，用于精确短语匹配 */
  phrases: string[];
  /** 名称与别名拆分出的词 */
  tokens: string[];
}

export const PARTIAL_SCORE = 85;

/**
 * Name and alias lookup over the company directory and the public
 * reference data. Built per task from a directory snapshot.
 */
export class EntityIndex {
  private readonly entries: IndexEntry[] = [];

  private readonly byId = new Map<string, IndexEntry>();

  private readonly byPhrase = new Map<string, IndexEntry[]>();

  public static build(
    directory: DirectorySnapshot,
    reference: ReferenceData
  ): EntityIndex {
    const index = new EntityIndex();
    const skills = new Map<string, string>();
    const wills = new Map<string, string>();
    for (const employee of directory.employees) {
      index.add("employee", employee.id, employee.name, []);
      employee.skills.forEach((skill) => skills.set(skill.id, skill.name));
      employee.wills.forEach((will) => wills.set(will.id, will.name));
    }
    for (const project of directory.projects) {
      index.add("project", project.id, project.name, project.aliases);
    }
    for (const customer of directory.customers) {
      index.add("customer", customer.id, customer.name, []);
    }
    for (const location of reference.locations) {
      index.add("location", location.id, location.name, [
        ...location.aliases,
        location.city,
        location.country,
      ]);
    }
    for (const department of reference.departments) {
      index.add("department", department.name, department.name, []);
    }
    skills.forEach((name, id) => index.add("skill", id, name, []));
    wills.forEach((name, id) => index.add("will", id, name, []));
    return index;
  }

  public add(
    kind: EntityKind,
    id: string,
    name: string,
    aliases: string[]
  ): void {
    const phrases = Array.from(
      new Set([name, ...aliases].map((value) => value.toLowerCase().trim()))
    ).filter((phrase) => phrase.length >= 2);
    const entry: IndexEntry = {
      kind,
      id,
      name,
      phrases,
      tokens: Array.from(new Set(phrases.flatMap((phrase) => tokenize(phrase)))),
    };
    this.entries.push(entry);
    this.byId.set(id.toLowerCase(), entry);
    for (const phrase of phrases) {
      const list = this.byPhrase.get(phrase) ?? [];
      if (!list.some((item) => item.kind === kind && item.id === id)) {
        list.push(entry);
      }
      this.byPhrase.set(phrase, list);
    }
  }

  public findById(id: string): IndexEntry | undefined {
    return this.byId.get(id.toLowerCase());
  }

  /** 按长度降序返回全部短语，长短语优先匹配 */
  public phrases(): string[] {
    return Array.from(this.byPhrase.keys()).sort(
      (a, b) => b.length - a.length || a.localeCompare(b)
    );
  }

  public exact(phrase: string): EntityCandidate[] {
    return (this.byPhrase.get(phrase.toLowerCase().trim()) ?? []).map((entry) =>
      toCandidate(entry, 100, "exact")
    );
  }

  /**
   * Every term token must be a prefix (3+ chars) of some token of the
   * entry's name or aliases.
   */
  public partial(term: string): EntityCandidate[] {
    const termTokens = tokenize(term);
    if (termTokens.length === 0 || termTokens.some((token) => token.length < 3)) {
      return [];
    }
    return this.entries
      .filter((entry) =>
        termTokens.every((token) =>
          entry.tokens.some((candidate) => candidate.startsWith(token))
        )
      )
      .map((entry) => toCandidate(entry, PARTIAL_SCORE, "partial"));
  }

  public fuzzy(term: string, threshold: number): EntityCandidate[] {
    const termTokens = tokenize(term);
    if (termTokens.length === 0) {
      return [];
    }
    const results: EntityCandidate[] = [];
    for (const entry of this.entries) {
      let best = 0;
      for (const phrase of entry.phrases) {
        best = Math.max(best, tokenSetRatio(term, phrase));
      }
      if (termTokens.length === 1) {
        const [single] = termTokens;
        for (const token of entry.tokens) {
          best = Math.max(best, ratio(single ?? "", token));
        }
      }
      if (best >= threshold) {
        // 模糊匹配得分低于部分匹配，避免与确定性结果混淆
        results.push(
          toCandidate(entry, Math.min(PARTIAL_SCORE - 1, Math.round(best * 100)), "fuzzy")
        );
      }
    }
    return results;
  }
}

function toCandidate(
  entry: IndexEntry,
  score: number,
  level: EntityCandidate["level"]
): EntityCandidate {
  return { kind: entry.kind, id: entry.id, name: entry.name, score, level };
}
