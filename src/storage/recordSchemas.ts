import { z } from "zod";
import type { EncryptedVaultRecord, Note } from "../types";

export const timestampSchema = z.string().datetime({ offset: true });

export const noteSchema: z.ZodType<Note> = z.object({
  id: z.string().min(1),
  title: z.string(),
  content: z.string(),
  tags: z.array(z.string()),
  updatedAt: timestampSchema,
  deletedAt: timestampSchema.nullable(),
});

export const encryptedVaultRecordSchema: z.ZodType<EncryptedVaultRecord> =
  z.object({
    id: z.string().min(1),
    titleEnc: z.string().min(1),
    usernameEnc: z.string().min(1).nullable(),
    secretEnc: z.string().min(1).nullable(),
    urlEnc: z.string().min(1).nullable(),
    noteEnc: z.string().min(1).nullable(),
    updatedAt: timestampSchema,
    deletedAt: timestampSchema.nullable(),
  });
