import type { SearchCriteria } from '../../../../common/search/SearchCriteria'
import { InvalidSearchCriteriaException } from '../exception/InvalidSearchCriteriaException'
import type { ApiSummary } from './Api'

/**
 * API 検索で使えるフィールド
 */
export const API_SEARCH_FIELDS = [
    'id',
    'name',
    'description',
    'organizationId',
    'organizationName',
] as const

export type ApiSearchField = (typeof API_SEARCH_FIELDS)[number]

export function isApiSearchField(field: string): field is ApiSearchField {
    return (API_SEARCH_FIELDS as readonly string[]).includes(field)
}

/**
 * 検索条件のフィールド名を検証する
 *
 * @throws InvalidSearchCriteriaException 未知のフィールドが含まれる場合
 */
export function validateApiSearchCriteria(criteria: SearchCriteria): void {
    for (const filter of criteria.filters) {
        if (!isApiSearchField(filter.name)) {
            throw new InvalidSearchCriteriaException(`Invalid search filter field: ${filter.name}`)
        }
        if (filter.operator === 'bool_eq' && !['true', 'false'].includes(filter.value.toLowerCase())) {
            throw new InvalidSearchCriteriaException(
                `Filter ${filter.name} expects true or false: ${filter.value}`
            )
        }
    }

    if (criteria.orderBy && !isApiSearchField(criteria.orderBy.name)) {
        throw new InvalidSearchCriteriaException(`Invalid order by field: ${criteria.orderBy.name}`)
    }
}

/**
 * インメモリ検索用のフィールドアクセサ
 */
export function apiSummaryField(api: ApiSummary, field: string): string | undefined {
    if (!isApiSearchField(field)) {
        return undefined
    }
    return api[field]
}
