import { z } from 'zod'
import { PagingSchema } from './Paging'

export const FilterOperatorSchema = z.enum(['eq', 'neq', 'like', 'bool_eq'])

export type FilterOperator = z.infer<typeof FilterOperatorSchema>

export const SearchFilterSchema = z.object({
    name: z.string().min(1),
    value: z.string(),
    operator: FilterOperatorSchema,
})

export type SearchFilter = z.infer<typeof SearchFilterSchema>

/**
 * 検索条件
 *
 * filters は AND で結合される。like の値では `*` がワイルドカード。
 */
export const SearchCriteriaSchema = z.object({
    filters: z.array(SearchFilterSchema).default([]),
    orderBy: z
        .object({
            name: z.string().min(1),
            ascending: z.boolean().default(true),
        })
        .optional(),
    paging: PagingSchema.optional(),
})

export type SearchCriteria = z.infer<typeof SearchCriteriaSchema>
