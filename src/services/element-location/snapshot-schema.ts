/**
 * Runtime shape of an ElementSnapshot, checked before strategies read one
 */

import { z } from 'zod';

const boundingBoxSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  width: z.number().finite().min(0),
  height: z.number().finite().min(0),
});

const snapshotNodeSchema = z.object({
  tag: z.string().min(1),
  id: z.string().optional(),
  classList: z.array(z.string()),
  attributes: z.record(z.string()),
  text: z.string(),
  boundingBox: boundingBoxSchema,
  screenshotRegion: z.instanceof(Buffer).optional(),
  parentIndex: z.number().int().nullable().optional(),
});

export const elementSnapshotSchema = z
  .object({
    url: z.string().optional(),
    title: z.string().optional(),
    capturedAt: z.number(),
    nodes: z.array(snapshotNodeSchema),
  })
  .superRefine((snapshot, ctx) => {
    snapshot.nodes.forEach((node, index) => {
      const parent = node.parentIndex;
      // document order puts every parent before its children
      if (parent !== undefined && parent !== null && (parent < 0 || parent >= index)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['nodes', index, 'parentIndex'],
          message: `parentIndex ${parent} must point at an earlier node`,
        });
      }
    });
  });

/**
 * Problems with a snapshot, formatted as `path: message`; empty when valid
 */
export function describeSnapshotIssues(value: unknown): string[] {
  const result = elementSnapshotSchema.safeParse(value);
  if (result.success) {
    return [];
  }
  return result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : 'snapshot';
    return `${path}: ${issue.message}`;
  });
}
