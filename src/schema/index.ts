import { z } from 'zod';

export const FolderSchema = z.object({
  id: z.number().int(),
  name: z.string(),
});
export type Folder = z.infer<typeof FolderSchema>;

export const ModelStateSchema = z.enum(['received', 'indexing', 'ready']);
export type ModelState = z.infer<typeof ModelStateSchema>;

export const ModelSchema = z.object({
  uuid: z.string().uuid(),
  name: z.string(),
  state: ModelStateSchema,
});
export type Model = z.infer<typeof ModelSchema>;

export const FolderListResponseSchema = z.object({
  folders: z.array(FolderSchema),
});

export const ModelListResponseSchema = z.object({
  models: z.array(ModelSchema),
});

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive(),
  token_type: z.string().optional(),
});
