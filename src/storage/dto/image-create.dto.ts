import { z } from 'zod';
import { httpUrl, metadataField } from '../../common/zod-schemas.js';

export const ImageCreateSchema = z.object({
  image_url: httpUrl,
  alt_text: z.string().max(500).nullish(),
  metadata: metadataField,
});

export type ImageCreate = z.infer<typeof ImageCreateSchema>;

export const ImageCreateListSchema = z.array(ImageCreateSchema).max(100);
