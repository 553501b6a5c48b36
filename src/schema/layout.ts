import { z } from "zod";
import { InvalidLayoutData } from "../errors.js";

/** An axis-aligned box in page pixel coordinates */
export const BoxSchema = z.object({
  top: z.number().finite(),
  left: z.number().finite(),
  width: z.number().finite().nonnegative(),
  height: z.number().finite().nonnegative(),
});
export type Box = z.infer<typeof BoxSchema>;

export const EdgesSchema = z.object({
  top: z.number().finite(),
  right: z.number().finite(),
  bottom: z.number().finite(),
  left: z.number().finite(),
});
export type Edges = z.infer<typeof EdgesSchema>;

export const ElementStyleSchema = z.object({
  /** Computed background color; absent when inherited or unknown */
  backgroundColor: z.string().optional(),
  /** Widest border side (px) */
  borderWidth: z.number().finite().nonnegative(),
  borderTopWidth: z.number().finite().nonnegative().optional(),
  borderBottomWidth: z.number().finite().nonnegative().optional(),
  margin: EdgesSchema,
  padding: EdgesSchema,
});
export type ElementStyle = z.infer<typeof ElementStyleSchema>;

export const LayoutElementSchema = z.object({
  tag: z.string().min(1),
  box: BoxSchema,
  style: ElementStyleSchema,
  text: z.string().default(""),
  hasText: z.boolean(),
  hasImage: z.boolean(),
  hasVideo: z.boolean(),
  domOrder: z.number().int().nonnegative(),
  /** domOrder of the nearest ancestor that is also in the snapshot */
  parentOrder: z.number().int().nonnegative().nullable().default(null),
  rawHtml: z.string(),
});
export type LayoutElement = z.infer<typeof LayoutElementSchema>;
export type LayoutElementInput = z.input<typeof LayoutElementSchema>;

export const PageSizeSchema = z.object({
  width: z.number().finite().positive(),
  height: z.number().finite().positive(),
});
export type PageSize = z.infer<typeof PageSizeSchema>;

export const LayoutSnapshotSchema = z
  .object({
    page: PageSizeSchema.optional(),
    elements: z.array(LayoutElementSchema),
  })
  .superRefine((snapshot, ctx) => {
    let previous = -1;
    const seen = new Set<number>();
    snapshot.elements.forEach((el, i) => {
      if (el.domOrder <= previous) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["elements", i, "domOrder"],
          message: `domOrder ${el.domOrder} does not follow ${previous}`,
        });
      }
      if (el.parentOrder !== null && !seen.has(el.parentOrder)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["elements", i, "parentOrder"],
          message: `parentOrder ${el.parentOrder} is not an earlier element`,
        });
      }
      seen.add(el.domOrder);
      previous = Math.max(previous, el.domOrder);
    });
  });
export type LayoutSnapshot = z.infer<typeof LayoutSnapshotSchema>;
export type LayoutSnapshotInput = z.input<typeof LayoutSnapshotSchema>;

/** Parse and validate a layout snapshot. Throws InvalidLayoutData on invalid input. */
export function parseSnapshot(data: unknown): LayoutSnapshot {
  const result = LayoutSnapshotSchema.safeParse(data);
  if (!result.success) {
    throw InvalidLayoutData.fromZodIssues(result.error.issues);
  }
  return result.data;
}

/** Page size from the snapshot, or the extent of its element boxes */
export function pageSizeOf(snapshot: LayoutSnapshot): PageSize {
  if (snapshot.page) return snapshot.page;
  let width = 0;
  let height = 0;
  for (const el of snapshot.elements) {
    width = Math.max(width, el.box.left + el.box.width);
    height = Math.max(height, el.box.top + el.box.height);
  }
  return { width, height };
}
