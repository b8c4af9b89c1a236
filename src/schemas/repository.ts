/**
 * Repository Schemas — Normalized view of one discovered open-source project.
 *
 * Every record a trending source hands back passes through `RepositoryRecord`
 * before it reaches the Scorer, so scoring code can rely on trimmed identity
 * fields, lower-cased topics and non-negative counters.
 */
import { z } from "zod/v4";

/** A topic tag: trimmed, lower-cased, non-empty. */
export const TopicTag = z.string().trim().toLowerCase().min(1);

export const RepositoryRecord = z
    .object({
        owner: z.string().trim().min(1),
        name: z.string().trim().min(1),
        /** Missing or null descriptions become "" so keyword matching never fails. */
        description: z
            .string()
            .nullish()
            .transform((d) => d?.trim() ?? ""),
        language: z
            .string()
            .nullish()
            .transform((l) => (l && l.trim() ? l.trim() : null)),
        stars: z.number().int().nonnegative().default(0),
        /** Stars gained over the trending window. */
        star_growth: z.number().int().nonnegative().default(0),
        topics: z
            .array(TopicTag)
            .default([])
            .transform((topics) => [...new Set(topics)]),
        url: z.url(),
    })
    .transform((record) => ({
        ...record,
        full_name: `${record.owner}/${record.name}`,
    }));
export type RepositoryRecord = z.output<typeof RepositoryRecord>;

/** The loosely-typed shape a trending source produces before validation. */
export type RepositoryRecordInput = z.input<typeof RepositoryRecord>;
