import { inject, injectable } from 'tsyringe'
import { normalizePaging, toRange } from '../../../../common/search/Paging'
import type { SearchCriteria } from '../../../../common/search/SearchCriteria'
import type { SearchResults } from '../../../../common/search/SearchResults'
import type { TypedSupabaseClient } from '../../../../config/types'
import { SupabaseClientToken } from '../../../../config/types'
import type {
    ApiSummary,
    ApiVersion,
    ApiVersionPolicySummary,
    ApiVersionSummary,
    DeveloperApiPlanSummary,
} from '../../../application/domain/model/Api'
import { isApiSearchField } from '../../../application/domain/model/ApiSearch'
import { InvalidSearchCriteriaException } from '../../../application/domain/exception/InvalidSearchCriteriaException'
import type { ApiCatalogPort } from '../../../application/port/out/ApiCatalogPort'
import {
    ApiDefinitionRecordSchema,
    ApiPlanRecordSchema,
    ApiPolicyRecordSchema,
    ApiRecordSchema,
    ApiVersionRecordSchema,
} from './entities/ApiCatalogRecord'
import {
    API_SEARCH_COLUMNS,
    toApiSummary,
    toApiVersion,
    toApiVersionSummary,
    toPlanSummary,
    toPolicySummary,
} from './mappers/ApiCatalogMapper'

function searchColumn(field: string): string {
    if (!isApiSearchField(field)) {
        throw new InvalidSearchCriteriaException(`Invalid search field: ${field}`)
    }
    return API_SEARCH_COLUMNS[field]
}

/**
 * like の値を ilike のパターンに変換する
 *
 * `*` だけをワイルドカードとし、`%` `_` `\` は文字そのものとして一致させる。
 */
export function toIlikePattern(value: string): string {
    return value.replace(/[\\%_]/g, '\\$&').replace(/\*/g, '%')
}

/**
 * Supabase を使った API カタログ
 *
 * 公開バージョンを持つ API は exposed_apis ビューから読む。
 */
@injectable()
export class SupabaseApiCatalogAdapter implements ApiCatalogPort {
    constructor(
        @inject(SupabaseClientToken) private readonly supabase: TypedSupabaseClient
    ) {}

    /**
     * 検索条件を PostgREST のクエリに変換して実行する
     *
     * like の `*` は `%` に置き換えて ilike（大文字小文字を区別しない）で検索する。
     */
    async searchExposedApis(criteria: SearchCriteria): Promise<SearchResults<ApiSummary>> {
        let query = this.supabase.from('exposed_apis').select('*', { count: 'exact' })

        for (const filter of criteria.filters) {
            const column = searchColumn(filter.name)
            switch (filter.operator) {
                case 'eq':
                    query = query.eq(column, filter.value)
                    break
                case 'neq':
                    query = query.neq(column, filter.value)
                    break
                case 'like':
                    query = query.ilike(column, toIlikePattern(filter.value))
                    break
                case 'bool_eq':
                    query = query.eq(column, filter.value.toLowerCase())
                    break
            }
        }

        if (criteria.orderBy) {
            query = query.order(searchColumn(criteria.orderBy.name), {
                ascending: criteria.orderBy.ascending,
            })
        } else {
            query = query.order('name', { ascending: true })
        }

        const { from, to } = toRange(normalizePaging(criteria.paging))
        const { data, count, error } = await query.range(from, to)

        if (error) {
            throw new Error(`Failed to search APIs: ${error.message}`)
        }

        const beans = ApiRecordSchema.array().parse(data).map(toApiSummary)
        return { beans, totalSize: count ?? beans.length }
    }

    async findFeaturedApis(): Promise<ApiSummary[]> {
        const { data, error } = await this.supabase
            .from('exposed_apis')
            .select('*')
            .eq('featured', true)
            .order('name', { ascending: true })

        if (error) {
            throw new Error(`Failed to load featured APIs: ${error.message}`)
        }

        return ApiRecordSchema.array().parse(data).map(toApiSummary)
    }

    async findApi(organizationId: string, apiId: string): Promise<ApiSummary | null> {
        const { data, error } = await this.supabase
            .from('apis')
            .select('*')
            .eq('organization_id', organizationId)
            .eq('id', apiId)
            .maybeSingle()

        if (error) {
            throw new Error(`Failed to load API: ${error.message}`)
        }

        return data === null ? null : toApiSummary(ApiRecordSchema.parse(data))
    }

    async listApiVersions(organizationId: string, apiId: string): Promise<ApiVersionSummary[]> {
        const { data, error } = await this.supabase
            .from('api_versions')
            .select('*')
            .eq('organization_id', organizationId)
            .eq('api_id', apiId)
            .order('created_on', { ascending: false })

        if (error) {
            throw new Error(`Failed to load API versions: ${error.message}`)
        }

        return ApiVersionRecordSchema.array().parse(data).map(toApiVersionSummary)
    }

    async findApiVersion(organizationId: string, apiId: string, version: string): Promise<ApiVersion | null> {
        const { data, error } = await this.supabase
            .from('api_versions')
            .select('*')
            .eq('organization_id', organizationId)
            .eq('api_id', apiId)
            .eq('version', version)
            .maybeSingle()

        if (error) {
            throw new Error(`Failed to load API version: ${error.message}`)
        }

        return data === null ? null : toApiVersion(ApiVersionRecordSchema.parse(data))
    }

    async listApiVersionPlans(
        organizationId: string,
        apiId: string,
        version: string
    ): Promise<DeveloperApiPlanSummary[]> {
        const { data, error } = await this.supabase
            .from('api_plans')
            .select('*')
            .eq('organization_id', organizationId)
            .eq('api_id', apiId)
            .eq('api_version', version)
            .order('plan_id', { ascending: true })

        if (error) {
            throw new Error(`Failed to load API plans: ${error.message}`)
        }

        return ApiPlanRecordSchema.array().parse(data).map(toPlanSummary)
    }

    async listApiVersionPolicies(
        organizationId: string,
        apiId: string,
        version: string
    ): Promise<ApiVersionPolicySummary[]> {
        const { data, error } = await this.supabase
            .from('api_policies')
            .select('*')
            .eq('organization_id', organizationId)
            .eq('api_id', apiId)
            .eq('api_version', version)
            .order('order_index', { ascending: true })

        if (error) {
            throw new Error(`Failed to load API policies: ${error.message}`)
        }

        return ApiPolicyRecordSchema.array().parse(data).map(toPolicySummary)
    }

    async findApiDefinition(organizationId: string, apiId: string, version: string): Promise<string | null> {
        const { data, error } = await this.supabase
            .from('api_definitions')
            .select('definition')
            .eq('organization_id', organizationId)
            .eq('api_id', apiId)
            .eq('api_version', version)
            .maybeSingle()

        if (error) {
            throw new Error(`Failed to load API definition: ${error.message}`)
        }

        return data === null ? null : ApiDefinitionRecordSchema.parse(data).definition
    }
}
