import { z } from 'zod'

/**
 * organizations テーブルの行
 */
export const OrganizationRecordSchema = z.object({
    id: z.string(),
    name: z.string(),
    description: z.string().nullable(),
    created_by: z.string(),
    created_on: z.string(),
})

export type OrganizationRecord = z.infer<typeof OrganizationRecordSchema>
