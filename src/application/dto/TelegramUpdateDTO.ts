import { z } from 'zod';

export const TelegramPhotoSizeSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  file_size: z.number().optional(),
});

export type TelegramPhotoSizeDTO = z.infer<typeof TelegramPhotoSizeSchema>;

export const TelegramDocumentSchema = z.object({
  file_id: z.string(),
  file_unique_id: z.string().optional(),
  file_name: z.string().optional(),
  mime_type: z.string().optional(),
  file_size: z.number().optional(),
});

export type TelegramDocumentDTO = z.infer<typeof TelegramDocumentSchema>;

export const TelegramMessageSchema = z.object({
  message_id: z.number().optional(),
  chat: z.object({ id: z.number() }),
  from: z.object({ id: z.number() }),
  date: z.number().optional(),
  text: z.string().optional(),
  caption: z.string().optional(),
  photo: z.array(TelegramPhotoSizeSchema).optional(),
  document: TelegramDocumentSchema.optional(),
});

export type TelegramMessageDTO = z.infer<typeof TelegramMessageSchema>;

export const TelegramUpdateSchema = z.object({
  update_id: z.number().optional(),
  message: TelegramMessageSchema.optional(),
});

export type TelegramUpdateDTO = z.infer<typeof TelegramUpdateSchema>;
