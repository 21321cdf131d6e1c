/** manifest 문서 zod 스키마. 누락된 플래그와 목록은 기본값으로 채움 */

import { z } from 'zod';
import { NODE_RESOURCE_KINDS } from '@nodepick/shared';

const MemberBaseSchema = z.object({
  name: z.string().min(1),
  packageName: z.string().min(1).optional(),
  fqn: z.array(z.string()).optional(),
  path: z.string().default(''),
  tags: z.array(z.string()).default([]),
  enabled: z.boolean().default(true),
  dependsOn: z.array(z.string().min(1)).default([]),
}).strict();

const NodeSchema = MemberBaseSchema.extend({
  resourceType: z.enum(NODE_RESOURCE_KINDS),
  empty: z.boolean().default(false),
}).strict();

const SourceSchema = MemberBaseSchema.extend({
  sourceName: z.string().min(1),
}).strict();

export const ManifestSchema = z.object({
  nodes: z.record(z.string().min(1), NodeSchema).default({}),
  sources: z.record(z.string().min(1), SourceSchema).default({}),
  exposures: z.record(z.string().min(1), MemberBaseSchema).default({}),
}).strict();

export type ManifestDocument = z.infer<typeof ManifestSchema>;
export type ManifestDocumentInput = z.input<typeof ManifestSchema>;
