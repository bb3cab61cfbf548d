import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { isSupportedSource } from "../domain/sources.js";
import type { SourceConfig, SourceConfigMap } from "../types/listing.js";
import { SourceConfigError } from "./errors.js";

const sourceSchema = z
  .object({
    enabled: z.boolean().default(false),
    keywords: z
      .array(z.string())
      .default([])
      .transform((values) => values.map((value) => value.trim()).filter(Boolean)),
    min_price: z.number().int().min(0).default(0),
    seed_on_first_run: z.boolean().default(false),
  })
  .transform(
    (value): SourceConfig => ({
      enabled: value.enabled,
      keywords: value.keywords,
      minPrice: value.min_price,
      seedOnFirstRun: value.seed_on_first_run,
    }),
  );

const sourcesFileSchema = z.object({
  version: z.number().int().optional(),
  sources: z.record(z.string(), sourceSchema).superRefine((sources, ctx) => {
    for (const name of Object.keys(sources)) {
      if (!isSupportedSource(name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [name],
          message: `Unsupported source: ${name}`,
        });
      }
    }
  }),
});

export function parseSourceConfigs(input: unknown, configPath = "<inline>"): SourceConfigMap {
  const result = sourcesFileSchema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new SourceConfigError(`Invalid sources config: ${detail}`, configPath, result.error);
  }
  return result.data.sources;
}

export async function readSourceConfigs(configPath: string): Promise<SourceConfigMap> {
  const absolute = path.isAbsolute(configPath) ? configPath : path.resolve(process.cwd(), configPath);

  let parsed: unknown;
  try {
    const raw = await fs.readFile(absolute, "utf8");
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new SourceConfigError(`Cannot read sources config: ${message}`, absolute, error);
  }

  return parseSourceConfigs(parsed, absolute);
}
