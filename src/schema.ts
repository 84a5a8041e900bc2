
import { z } from "zod";

import { SchemaReadError } from "./errors";
import { GrammarDocument } from "./grammar";
import { type Identifier, isIdentifier } from "./identifier";
import { type NodeTypeDefinition, NodeTypesDocument } from "./node-types";
import type { Rule } from "./rules";

const identifierSchema = z.string().refine(isIdentifier, text => ({
  message: `'${text}' is not a valid identifier`,
}));

/**
 * Accepts a JSON object whose keys must be identifiers and turns it into a
 * list of entries that keeps the order of the keys.
 */
function identifierEntries<T extends z.ZodTypeAny>(valueSchema: T) {
  return z.record(z.string(), valueSchema)
    .superRefine((record, ctx) => {
      for (const key of Object.keys(record)) {
        if (!isIdentifier(key)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [ key ],
            message: `'${key}' is not a valid identifier`,
          });
        }
      }
    })
    .transform(record => {
      const entries: [Identifier, z.output<T>][] = [];
      for (const [key, value] of Object.entries(record)) {
        if (isIdentifier(key)) {
          entries.push([ key, value ]);
        }
      }
      return entries;
    });
}

const precedenceValueSchema = z.union([ z.number().int(), z.string() ]);

export const ruleSchema: z.ZodType<Rule, z.ZodTypeDef, unknown> = z.lazy(() => z.discriminatedUnion('type', [
  z.object({ type: z.literal('SEQ'), members: z.array(ruleSchema) }),
  z.object({ type: z.literal('CHOICE'), members: z.array(ruleSchema) }),
  z.object({ type: z.literal('FIELD'), name: identifierSchema, content: ruleSchema }),
  z.object({ type: z.literal('TOKEN'), content: ruleSchema }),
  z.object({ type: z.literal('IMMEDIATE_TOKEN'), content: ruleSchema }),
  z.object({ type: z.literal('REPEAT'), content: ruleSchema }),
  z.object({ type: z.literal('REPEAT1'), content: ruleSchema }),
  z.object({ type: z.literal('RESERVED'), context_name: identifierSchema, content: ruleSchema }),
  z.object({ type: z.literal('PREC'), value: precedenceValueSchema, content: ruleSchema }),
  z.object({ type: z.literal('PREC_LEFT'), value: precedenceValueSchema, content: ruleSchema }),
  z.object({ type: z.literal('PREC_RIGHT'), value: precedenceValueSchema, content: ruleSchema }),
  z.object({ type: z.literal('PREC_DYNAMIC'), value: precedenceValueSchema, content: ruleSchema }),
  z.object({ type: z.literal('STRING'), value: z.string() }),
  z.object({ type: z.literal('PATTERN'), value: z.string(), flags: z.string().optional() }),
  z.object({ type: z.literal('SYMBOL'), name: identifierSchema }),
  z.object({ type: z.literal('ALIAS'), value: z.string(), named: z.boolean(), content: ruleSchema }),
  z.object({ type: z.literal('BLANK') }),
]));

export const grammarSchema = z.object({
  $schema: z.string().optional(),
  name: identifierSchema,
  inherits: identifierSchema.nullish(),
  rules: identifierEntries(ruleSchema),
  conflicts: z.array(z.array(identifierSchema)).default([]),
  precedences: z.array(z.array(ruleSchema)).default([]),
  externals: z.array(ruleSchema).default([]),
  extras: z.array(ruleSchema).default([]),
  inline: z.array(identifierSchema).default([]),
  reserved: identifierEntries(z.array(ruleSchema)).optional(),
  supertypes: z.array(identifierSchema).default([]),
  word: identifierSchema.nullish(),
});

const nodeTypeSchema = z.object({
  type: z.string(),
  named: z.boolean(),
});

const nodeChildrenSchema = z.object({
  multiple: z.boolean(),
  required: z.boolean(),
  types: z.array(nodeTypeSchema),
});

const superTypeDefinitionSchema = nodeTypeSchema.extend({
  subtypes: z.array(nodeTypeSchema),
  root: z.boolean().optional(),
  extra: z.boolean().optional(),
});

const regularDefinitionSchema = nodeTypeSchema.extend({
  fields: identifierEntries(nodeChildrenSchema).optional(),
  children: nodeChildrenSchema.optional(),
  root: z.boolean().optional(),
  extra: z.boolean().optional(),
});

// Super-types are tried first, because a regular definition accepts any
// object that has a type and a name.
export const nodeTypesSchema = z.array(z.union([ superTypeDefinitionSchema, regularDefinitionSchema ]));

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Build a grammar from the contents of a `grammar.json` file.
 */
export function parseGrammar(json: unknown, filePath: string | null = null): GrammarDocument {
  const result = grammarSchema.safeParse(json);
  if (!result.success) {
    throw new SchemaReadError('grammar.json', formatIssues(result.error), filePath);
  }
  const data = result.data;
  return new GrammarDocument({
    name: data.name,
    rules: data.rules,
    inherits: data.inherits ?? null,
    conflicts: data.conflicts,
    precedences: data.precedences,
    externals: data.externals,
    extras: data.extras,
    inline: data.inline,
    reserved: data.reserved ?? [],
    supertypes: data.supertypes,
    word: data.word ?? null,
  });
}

/**
 * Build a catalogue of node types from the contents of a `node-types.json`
 * file.
 */
export function parseNodeTypes(json: unknown, filePath: string | null = null): NodeTypesDocument {
  const result = nodeTypesSchema.safeParse(json);
  if (!result.success) {
    throw new SchemaReadError('node-types.json', formatIssues(result.error), filePath);
  }
  const definitions = result.data.map((data): NodeTypeDefinition => {
    const nodeType = { type: data.type, named: data.named };
    const root = data.root ?? false;
    const extra = data.extra ?? false;
    if ('subtypes' in data) {
      return { nodeType, kind: { kind: 'supertype', subtypes: data.subtypes }, root, extra };
    }
    return {
      nodeType,
      kind: {
        kind: 'regular',
        fields: data.fields === undefined ? null : new Map(data.fields),
        children: data.children ?? null,
      },
      root,
      extra,
    };
  });
  return new NodeTypesDocument(definitions);
}
