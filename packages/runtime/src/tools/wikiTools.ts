import { z } from "zod";
import type { PlatformClient } from "../platform/PlatformClient.js";
import type { Retriever } from "../retrieval/KeywordWikiRetriever.js";
import { defineTool, ToolFailure } from "../registry/ToolRegistry.js";
import type { AnyToolAdapter } from "../types/index.js";

const WikiPath = z
  .string()
  .min(1)
  .regex(/^[^/\s][^\s]*$/, "Expected a relative path without spaces");

/** 根级名称（不含 "/"）按文件名匹配，必须恰好命中一页 */
async function locatePage(platform: PlatformClient, path: string): Promise<string> {
  const paths = await platform.listWiki();
  if (paths.includes(path)) {
    return path;
  }
  const matches = path.includes("/")
    ? []
    : paths.filter((candidate) => candidate.split("/").pop() === path);
  if (matches.length === 1) {
    return matches[0];
  }
  if (matches.length > 1) {
    throw new ToolFailure("invalid_arguments", `Wiki page name ${path} is ambiguous`, {
      path,
      candidates: matches,
    });
  }
  throw new ToolFailure("not_found", `Wiki page ${path} not found`, { path });
}

export function createWikiTools(
  platform: PlatformClient,
  retriever: Retriever
): AnyToolAdapter[] {
  const search = defineTool({
    id: "wiki.search",
    description:
      "Search the company wiki. Returns ranked page paths with snippets; open a page with wiki.get for details.",
    entity: "wiki",
    mutates: false,
    inputSchema: z
      .object({
        query: z.string().min(2),
        limit: z.number().int().min(1).max(10).default(5),
      })
      .strict(),
    outputSchema: z.object({
      results: z.array(
        z.object({ path: z.string(), snippet: z.string(), score: z.number() })
      ),
    }),
    async execute({ params }) {
      return { results: await retriever.search(params.query, params.limit) };
    },
  });

  const list = defineTool({
    id: "wiki.list",
    description: "List all wiki page paths.",
    entity: "wiki",
    mutates: false,
    inputSchema: z.object({}).strict(),
    outputSchema: z.object({ paths: z.array(z.string()) }),
    async execute() {
      return { paths: await platform.listWiki() };
    },
  });

  const get = defineTool({
    id: "wiki.get",
    description: "Read one wiki page by path.",
    entity: "wiki",
    mutates: false,
    inputSchema: z.object({ path: z.string().min(1) }).strict(),
    outputSchema: z.object({ path: z.string(), content: z.string() }),
    async execute({ params }) {
      return platform.getWikiPage(params.path);
    },
  });

  const create = defineTool({
    id: "wiki.create",
    description:
      "Create new wiki pages. Existing paths are reported as failed and left untouched.",
    entity: "wiki",
    mutates: true,
    inputSchema: z
      .object({
        pages: z
          .array(z.object({ path: WikiPath, content: z.string().min(1) }).strict())
          .min(1)
          .max(10),
      })
      .strict(),
    outputSchema: z.object({
      created: z.array(z.string()),
      failed: z.array(z.object({ path: z.string(), reason: z.string() })),
    }),
    async execute({ params }) {
      const existing = new Set(await platform.listWiki());
      const created: string[] = [];
      const failed: Array<{ path: string; reason: string }> = [];
      for (const page of params.pages) {
        if (existing.has(page.path)) {
          failed.push({ path: page.path, reason: "already exists" });
          continue;
        }
        await platform.putWikiPage(page);
        existing.add(page.path);
        created.push(page.path);
      }
      return { created, failed };
    },
  });

  const rename = defineTool({
    id: "wiki.rename",
    description: "Move a wiki page to a new path, keeping its content.",
    entity: "wiki",
    mutates: true,
    inputSchema: z.object({ from: WikiPath, to: WikiPath }).strict(),
    outputSchema: z.object({ from: z.string(), to: z.string() }),
    async execute({ params }) {
      const from = await locatePage(platform, params.from);
      if (from === params.to) {
        throw new ToolFailure("conflict", `Wiki page is already at ${params.to}`, {
          to: params.to,
        });
      }
      if ((await platform.listWiki()).includes(params.to)) {
        throw new ToolFailure("conflict", `Wiki page ${params.to} already exists`, {
          to: params.to,
        });
      }
      const page = await platform.getWikiPage(from);
      await platform.putWikiPage({ path: params.to, content: page.content });
      await platform.deleteWikiPage(from);
      return { from, to: params.to };
    },
  });

  const remove = defineTool({
    id: "wiki.delete",
    description:
      "Delete one wiki page. A bare file name is accepted when it matches exactly one page.",
    entity: "wiki",
    mutates: true,
    inputSchema: z.object({ path: WikiPath }).strict(),
    outputSchema: z.object({ deleted: z.string() }),
    async execute({ params }) {
      const path = await locatePage(platform, params.path);
      await platform.deleteWikiPage(path);
      return { deleted: path };
    },
  });

  return [search, list, get, create, rename, remove];
}
