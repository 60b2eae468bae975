import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';

const platformId = z.number().int();

export const videoAssetSchema = z.object({
  sourceChatId: platformId,
  sourceMessageId: platformId,
  fileSize: z.number().int().nonnegative(),
  duration: z.number().nonnegative(),
  height: z.number().int().positive().optional(),
  codec: z.string().min(1).optional(),
  container: z.string().min(1).optional(),
});

export const userSubmissionSchema = z.object({
  userId: platformId,
  asset: videoAssetSchema,
});

export const channelSubmissionSchema = z.object({
  channelId: platformId,
  messageId: platformId,
  asset: videoAssetSchema,
});

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new BadRequestException(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`),
    );
  }
  return parsed.data;
}
