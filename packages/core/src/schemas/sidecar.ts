import { z } from "zod";
import {
  ROOT,
  TRASH,
  directoryParent,
  type Parent,
} from "../records/types.js";
import { parseIdentifier } from "../records/paths.js";

const ROOT_PARENT_VALUE = "";
const TRASH_PARENT_VALUE = "trash";

/** `""` → root, `"trash"` → trash, an identifier → that directory. */
export const ParentFieldSchema = z
  .string()
  .transform((value, ctx): Parent => {
    if (value === ROOT_PARENT_VALUE) return ROOT;
    if (value === TRASH_PARENT_VALUE) return TRASH;

    const id = parseIdentifier(value);
    if (id === undefined) {
      ctx.addIssue({
        code: "custom",
        message: `Invalid parent reference: ${value}`,
      });
      return z.NEVER;
    }
    return directoryParent(id);
  });

export function encodeParent(parent: Parent): string {
  switch (parent.type) {
    case "root":
      return ROOT_PARENT_VALUE;
    case "trash":
      return TRASH_PARENT_VALUE;
    case "directory":
      return parent.id;
  }
}

/** `<id>.metadata` */
export const MetadataSchema = z.object({
  type: z.enum(["DocumentType", "CollectionType"]),
  visibleName: z.string(),
  parent: ParentFieldSchema,
  pinned: z.boolean(),
});

export type Metadata = z.infer<typeof MetadataSchema>;

/** `<id>.content`, documents only */
export const ContentSchema = z.object({
  fileType: z.enum(["notebook", "pdf", "epub"]),
});

export type Content = z.infer<typeof ContentSchema>;
