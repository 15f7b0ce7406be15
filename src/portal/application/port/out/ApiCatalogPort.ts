import type { SearchCriteria } from '../../../../common/search/SearchCriteria'
import type { SearchResults } from '../../../../common/search/SearchResults'
import type {
    ApiSummary,
    ApiVersion,
    ApiVersionPolicySummary,
    ApiVersionSummary,
    DeveloperApiPlanSummary,
} from '../../domain/model/Api'

/**
 * API カタログを読み込むための出力ポート
 * 永続化アダプターが実装する
 */
export interface ApiCatalogPort {
    /**
     * ポータルに公開されたバージョンを1つ以上持つ API を検索
     *
     * 条件のフィールド名は検証済みであること。
     */
    searchExposedApis(criteria: SearchCriteria): Promise<SearchResults<ApiSummary>>

    /**
     * おすすめ API（公開バージョンあり）を名前順で取得
     */
    findFeaturedApis(): Promise<ApiSummary[]>

    findApi(organizationId: string, apiId: string): Promise<ApiSummary | null>

    /**
     * API の全バージョン（作成日時の新しい順）
     */
    listApiVersions(organizationId: string, apiId: string): Promise<ApiVersionSummary[]>

    findApiVersion(organizationId: string, apiId: string, version: string): Promise<ApiVersion | null>

    listApiVersionPlans(
        organizationId: string,
        apiId: string,
        version: string
    ): Promise<DeveloperApiPlanSummary[]>

    /**
     * バージョンのポリシー（orderIndex 順）
     */
    listApiVersionPolicies(
        organizationId: string,
        apiId: string,
        version: string
    ): Promise<ApiVersionPolicySummary[]>

    /**
     * API 定義の本文
     *
     * @returns 登録されていない場合は null
     */
    findApiDefinition(organizationId: string, apiId: string, version: string): Promise<string | null>
}

/**
 * DI用のシンボル
 */
export const ApiCatalogPortToken = Symbol('ApiCatalogPort')
