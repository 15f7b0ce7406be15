import { z } from 'zod'

export const DEFAULT_PAGE_SIZE = 20
export const MAX_PAGE_SIZE = 100

/**
 * ページング指定（page は 1 始まり）
 */
export const PagingSchema = z.object({
    page: z.coerce.number().int().min(1).default(1),
    pageSize: z.coerce.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
})

export type Paging = z.infer<typeof PagingSchema>

/**
 * 省略されたページングを既定値で埋める
 */
export function normalizePaging(paging?: Partial<Paging> | null): Paging {
    return {
        page: paging?.page ?? 1,
        pageSize: Math.min(paging?.pageSize ?? DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE),
    }
}

/**
 * ページングを 0 始まりの [from, to]（両端含む）に変換
 *
 * Supabase の range() と Array.prototype.slice() の両方で使う。
 */
export function toRange(paging: Paging): { from: number; to: number } {
    const from = (paging.page - 1) * paging.pageSize
    return { from, to: from + paging.pageSize - 1 }
}

/**
 * 配列にページングを適用する（インメモリアダプター用）
 */
export function paginate<T>(items: readonly T[], paging: Paging): T[] {
    const { from, to } = toRange(paging)
    return items.slice(from, to + 1)
}
