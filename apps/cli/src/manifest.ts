import { z } from "zod";
import {
  type CanonicalType,
  err,
  ok,
  type Result,
  type WireDeclaration,
} from "@portcheck/compiler";

const typeRefSchema = z.object({
  moduleId: z.string().min(1),
  name: z.string().min(1),
});

export const canonicalTypeSchema: z.ZodType<CanonicalType> = z.lazy(() =>
  z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("named"), ref: typeRefSchema }),
    z.object({
      kind: z.literal("applied"),
      constructor: canonicalTypeSchema,
      args: z.array(canonicalTypeSchema),
    }),
    z.object({ kind: z.literal("variable"), id: z.string().min(1) }),
    z.object({
      kind: z.literal("function"),
      argType: canonicalTypeSchema,
      resultType: canonicalTypeSchema,
    }),
    z.object({
      kind: z.literal("record"),
      fields: z.array(
        z.object({ name: z.string().min(1), type: canonicalTypeSchema }),
      ),
      extension: z.string().min(1).optional(),
    }),
    z.object({
      kind: z.literal("aliased"),
      alias: typeRefSchema,
      args: z.array(z.tuple([z.string().min(1), canonicalTypeSchema])),
      body: canonicalTypeSchema,
    }),
  ]),
);

const spanSchema = z.object({
  file: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

const portSchema = {
  name: z.string().min(1),
  type: canonicalTypeSchema,
  span: spanSchema.optional(),
};

const declarationSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("input"), ...portSchema }),
  z.object({ kind: z.literal("output"), ...portSchema }),
  z.object({
    kind: z.literal("loopback"),
    ...portSchema,
    expr: z.unknown().optional(),
  }),
]);

export const manifestSchema = z.object({
  module: z.string().min(1),
  declarations: z.array(declarationSchema),
});

export type PortManifest = {
  module: string;
  declarations: WireDeclaration<unknown>[];
};

const formatIssue = (issue: z.ZodIssue): string => {
  const path = issue.path.length > 0 ? issue.path.join(".") : "<root>";
  return `${path}: ${issue.message}`;
};

/** Validates parsed manifest JSON, returning one message per zod issue. */
export const parseManifest = (
  input: unknown,
): Result<readonly string[], PortManifest> => {
  const parsed = manifestSchema.safeParse(input);
  if (!parsed.success) {
    return err(parsed.error.issues.map(formatIssue));
  }
  const manifest: PortManifest = parsed.data;
  return ok(manifest);
};
