import { z } from "zod";
import catalog from "./patterns.json";
import { RULE_CATEGORIES, type Rewrite, type Rule, type RuleSet } from "./schema";

const RuleEntrySchema = z
  .object({
    pattern: z.string().min(1),
    replacement: z.string().optional(),
    flag: z.literal(true).optional(),
    explanation: z.string().min(1),
    impact: z.number().int().positive(),
  })
  .superRefine((r, ctx) => {
    if ((r.replacement === undefined) === (r.flag === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: "rule needs exactly one of replacement or flag" });
    }
    const err = regexError(r.pattern);
    if (err) ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["pattern"], message: err });
  });

export const CatalogSchema = z.object({
  categories: z.array(
    z.object({
      category: z.enum(RULE_CATEGORIES),
      rules: z.array(RuleEntrySchema).min(1),
    })
  ),
});

export type Catalog = z.infer<typeof CatalogSchema>;

function regexError(pattern: string): string | undefined {
  try {
    new RegExp(pattern, "gi");
    return undefined;
  } catch (e: unknown) {
    return e instanceof Error ? e.message : String(e);
  }
}

/** Validates a catalog and compiles it into a frozen, ordered RuleSet. Throws ZodError on bad input. */
export function compileRuleSet(input: unknown): RuleSet {
  const parsed = CatalogSchema.parse(input);
  const rules: Rule[] = [];
  for (const { category, rules: entries } of parsed.categories) {
    entries.forEach((entry, i) => {
      const rewrite: Rewrite = entry.flag ? { kind: "flag" } : { kind: "replace", text: entry.replacement ?? "" };
      const rule: Rule = {
        id: `${category}.${i}`,
        category,
        pattern: new RegExp(entry.pattern, "gi"),
        rewrite: Object.freeze(rewrite),
        explanation: entry.explanation,
        impact: entry.impact,
      };
      rules.push(Object.freeze(rule));
    });
  }
  return Object.freeze(rules);
}

export const DEFAULT_RULES: RuleSet = compileRuleSet(catalog);
