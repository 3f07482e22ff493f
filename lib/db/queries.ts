import { z } from "zod";

import { sql } from "@/lib/db/client";
import type { ProjectContext } from "@/lib/types";

interface ProjectRow {
  id: string;
  name: string;
  description: string | null;
  targetProductName: string | null;
  targetProductCategory: string | null;
  targetBudget: string | number | null;
  currency: string | null;
  status: string;
  pipelineType: string;
}

function toNumberOrNull(value: string | number | null): number | null {
  if (value === null) {
    return null;
  }

  const parsed = typeof value === "number" ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

const projectIdSchema = z.string().uuid();

export function isProjectId(value: string): boolean {
  return projectIdSchema.safeParse(value).success;
}

// projects.id is a uuid column; anything else cannot match a row.
export async function getProjectContext(projectId: string): Promise<ProjectContext | null> {
  if (!isProjectId(projectId)) {
    return null;
  }

  const rows = await sql<ProjectRow[]>`
    select
      id,
      name,
      description,
      target_product_name,
      target_product_category,
      target_budget,
      currency,
      status,
      pipeline_type
    from projects
    where id = ${projectId}
    limit 1
  `;

  const row = rows[0];
  if (!row) {
    return null;
  }

  return Object.freeze({
    id: row.id,
    name: row.name,
    description: row.description ?? "",
    targetProductName: row.targetProductName ?? "",
    targetProductCategory: row.targetProductCategory ?? "",
    targetBudget: toNumberOrNull(row.targetBudget),
    currency: row.currency ?? "VND",
    status: row.status,
    pipelineType: row.pipelineType
  });
}

export async function findExistingProductUrls(projectId: string, productUrls: string[]): Promise<Set<string>> {
  if (productUrls.length === 0) {
    return new Set();
  }

  const rows = await sql<{ productUrl: string }[]>`
    select product_url
    from discovered_products
    where
      project_id = ${projectId}
      and product_url in ${sql(productUrls)}
  `;

  return new Set(rows.map((row) => row.productUrl));
}
