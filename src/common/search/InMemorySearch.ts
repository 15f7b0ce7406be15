import { normalizePaging, paginate } from './Paging'
import type { SearchCriteria, SearchFilter } from './SearchCriteria'
import type { SearchResults } from './SearchResults'

/**
 * 検索対象のフィールド値を取り出す関数
 */
export type FieldAccessor<T> = (item: T, field: string) => string | boolean | undefined

/**
 * like 用のパターンを正規表現に変換（`*` → `.*`、大文字小文字を区別しない）
 */
export function likeToRegExp(pattern: string): RegExp {
    const escaped = pattern
        .split('*')
        .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
        .join('.*')
    return new RegExp(`^${escaped}$`, 'i')
}

function matches<T>(item: T, filter: SearchFilter, accessor: FieldAccessor<T>): boolean {
    const actual = accessor(item, filter.name)

    switch (filter.operator) {
        case 'eq':
            return actual !== undefined && String(actual) === filter.value
        case 'neq':
            return actual === undefined || String(actual) !== filter.value
        case 'like':
            return typeof actual === 'string' && likeToRegExp(filter.value).test(actual)
        case 'bool_eq':
            return actual !== undefined && String(actual).toLowerCase() === filter.value.toLowerCase()
    }
}

/**
 * 検索条件（フィルタ・並び順・ページング）をメモリ上の配列に適用する
 *
 * フィールド名の妥当性チェックは呼び出し側の責務。
 */
export function applyCriteria<T>(
    items: readonly T[],
    criteria: SearchCriteria,
    accessor: FieldAccessor<T>
): SearchResults<T> {
    const filtered = items.filter((item) =>
        criteria.filters.every((filter) => matches(item, filter, accessor))
    )

    const { orderBy } = criteria
    if (orderBy) {
        const direction = orderBy.ascending ? 1 : -1
        filtered.sort((a, b) => {
            const left = String(accessor(a, orderBy.name) ?? '')
            const right = String(accessor(b, orderBy.name) ?? '')
            return left.localeCompare(right) * direction
        })
    }

    return {
        beans: paginate(filtered, normalizePaging(criteria.paging)),
        totalSize: filtered.length,
    }
}
