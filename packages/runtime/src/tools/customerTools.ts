import { z } from "zod";
import type { PlatformClient } from "../platform/PlatformClient.js";
import { CustomerSchema } from "../platform/records.js";
import { defineTool } from "../registry/ToolRegistry.js";
import type { AnyToolAdapter } from "../types/index.js";

export function createCustomerTools(platform: PlatformClient): AnyToolAdapter[] {
  const search = defineTool({
    id: "customers.search",
    description:
      "Search customers by free text, location, deal phase or account manager id. Paged.",
    entity: "customer",
    mutates: false,
    inputSchema: z
      .object({
        query: z.string().min(1).optional(),
        location: z.string().min(1).optional(),
        dealPhase: CustomerSchema.shape.dealPhase.optional(),
        accountManagerId: z.string().min(1).optional(),
        limit: z.number().int().min(1).max(20).default(10),
        offset: z.number().int().min(0).default(0),
      })
      .strict(),
    outputSchema: z.object({
      customers: z.array(CustomerSchema),
      nextOffset: z.number().nullable(),
    }),
    async execute({ params }) {
      const page = await platform.searchCustomers(params);
      return { customers: page.items, nextOffset: page.nextOffset };
    },
  });

  const get = defineTool({
    id: "customers.get",
    description: "Load one customer record.",
    entity: "customer",
    mutates: false,
    inputSchema: z.object({ id: z.string().min(1) }).strict(),
    outputSchema: z.object({ customer: CustomerSchema }),
    async execute({ params }) {
      return { customer: await platform.getCustomer(params.id) };
    },
  });

  return [search, get];
}
