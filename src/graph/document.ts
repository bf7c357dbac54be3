/**
 * @file document.ts
 * @description Persisted shape of a graph: node records plus edges addressed by node id.
 *
 * @pitfalls
 * - Operators are re-resolved by `(library, operator)` on load. A saved config that no
 *   longer fits the registered operator is reset slot by slot, not migrated.
 * - Texture ids are session-local; loaders must drop them.
 */
import { z } from 'zod';
import { DocumentError, type DocumentIssue } from '../errors';
import { TEXTURE_FORMATS } from '../value/texture';
import type { NodeRecord } from './node';

export const DOCUMENT_VERSION = 1;

const TextureHandleSchema = z.object({
  id: z.number().int().nonnegative().optional(),
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  format: z.enum(TEXTURE_FORMATS),
});

export const ValueSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('i32'), value: z.number().int() }),
  z.object({ type: z.literal('f32'), value: z.number() }),
  z.object({ type: z.literal('bool'), value: z.boolean() }),
  z.object({ type: z.literal('string'), value: z.string() }),
  z.object({ type: z.literal('texture'), value: TextureHandleSchema }),
  z.object({ type: z.literal('null') }),
]);

export const NodeRecordSchema = z.object({
  id: z.number().int().nonnegative(),
  path: z.object({ library: z.string().min(1), operator: z.string().min(1) }),
  label: z.string().optional(),
  position: z.tuple([z.number(), z.number()]),
  inputValues: z.array(ValueSchema),
  configValues: z.array(ValueSchema),
});

export const DocumentEdgeSchema = z.object({
  from: z.number().int().nonnegative(),
  fromSlot: z.number().int().nonnegative(),
  to: z.number().int().nonnegative(),
  toSlot: z.number().int().nonnegative(),
});

export const GraphDocumentSchema = z.object({
  version: z.literal(DOCUMENT_VERSION),
  nodes: z.array(NodeRecordSchema),
  edges: z.array(DocumentEdgeSchema),
}).superRefine((doc, ctx) => {
  const ids = new Set<number>();
  doc.nodes.forEach((n, i) => {
    if (ids.has(n.id)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['nodes', i, 'id'], message: `Duplicate node id ${n.id}` });
    }
    ids.add(n.id);
  });
  doc.edges.forEach((e, i) => {
    for (const end of ['from', 'to'] as const) {
      if (!ids.has(e[end])) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['edges', i, end], message: `Edge references unknown node ${e[end]}` });
      }
    }
  });
});

export type DocumentEdge = z.infer<typeof DocumentEdgeSchema>;

export interface GraphDocument {
  version: typeof DOCUMENT_VERSION;
  nodes: NodeRecord[];
  edges: DocumentEdge[];
}

export function parseDocument(input: unknown): GraphDocument {
  const result = GraphDocumentSchema.safeParse(input);
  if (!result.success) {
    const issues: DocumentIssue[] = result.error.issues.map(issue => ({
      path: issue.path.map(String),
      message: issue.message,
      code: issue.code,
    }));
    throw new DocumentError(issues);
  }
  return result.data;
}
