import type { PlatformClient } from "../platform/PlatformClient.js";
import {
  KeywordWikiRetriever,
  type Retriever,
} from "../retrieval/KeywordWikiRetriever.js";
import { InMemoryToolRegistry } from "../registry/ToolRegistry.js";
import { createCustomerTools } from "./customerTools.js";
import { createEmployeeTools } from "./employeeTools.js";
import { createProjectTools } from "./projectTools.js";
import { createTimeTools } from "./timeTools.js";
import { createWikiTools } from "./wikiTools.js";

export { createCustomerTools } from "./customerTools.js";
export { createEmployeeTools } from "./employeeTools.js";
export { createProjectTools } from "./projectTools.js";
export { createTimeTools } from "./timeTools.js";
export { createWikiTools } from "./wikiTools.js";

/**
 * Builds the sealed registry with every platform tool. Without an
 * explicit retriever the wiki is searched by keyword overlap.
 */
export function createDefaultRegistry(
  platform: PlatformClient,
  retriever?: Retriever
): InMemoryToolRegistry {
  const wikiRetriever =
    retriever ??
    new KeywordWikiRetriever(async () => {
      const paths = await platform.listWiki();
      return Promise.all(paths.map((path) => platform.getWikiPage(path)));
    });
  return new InMemoryToolRegistry([
    ...createEmployeeTools(platform),
    ...createProjectTools(platform),
    ...createCustomerTools(platform),
    ...createTimeTools(platform),
    ...createWikiTools(platform, wikiRetriever),
  ]).seal();
}
