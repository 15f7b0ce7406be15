import { inject, injectable } from 'tsyringe'
import type { EventBus } from '../../../common/event/EventBus'
import { ApiSignupEvent } from '../../../common/event/events/ApiSignupEvent'
import type { SearchCriteria } from '../../../common/search/SearchCriteria'
import type { SearchResults } from '../../../common/search/SearchResults'
import { tryAction } from '../../../common/util/tryAction'
import { EventBusToken } from '../../../config/types'
import { PlanNotFoundException } from '../domain/exception/PlanNotFoundException'
import type { ApiSummary, ApiVersionPolicySummary, DeveloperApiPlanSummary } from '../domain/model/Api'
import { validateApiSearchCriteria } from '../domain/model/ApiSearch'
import type { ApiCatalogPort } from '../port/out/ApiCatalogPort'
import { ApiCatalogPortToken } from '../port/out/ApiCatalogPort'
import { ApiService } from './ApiService'

/**
 * API 利用申請の結果
 */
export interface ApiSignupResult {
    approvalRequired: boolean
}

/**
 * 開発者ポータル向けのサービス
 *
 * ポータルに公開されたバージョンだけを扱う。
 */
@injectable()
export class DevPortalService {
    constructor(
        @inject(ApiCatalogPortToken)
        private readonly catalog: ApiCatalogPort,
        @inject(ApiService)
        private readonly apiService: ApiService,
        @inject(EventBusToken)
        private readonly eventBus: EventBus
    ) {}

    /**
     * 公開バージョンを持つ API を検索
     *
     * @throws InvalidSearchCriteriaException 未知のフィールドを指定した場合
     */
    async findExposedApis(criteria: SearchCriteria): Promise<SearchResults<ApiSummary>> {
        validateApiSearchCriteria(criteria)
        return tryAction(() => this.catalog.searchExposedApis(criteria))
    }

    /**
     * 公開バージョンのプランのうち、ポータルに表示するもの
     *
     * @throws ApiVersionNotFoundException バージョンが存在しない、または非公開の場合
     */
    async getApiVersionPlans(
        organizationId: string,
        apiId: string,
        version: string
    ): Promise<DeveloperApiPlanSummary[]> {
        await this.apiService.getExposedApiVersion(organizationId, apiId, version)

        const plans = await tryAction(() =>
            this.catalog.listApiVersionPlans(organizationId, apiId, version)
        )
        return plans.filter((plan) => plan.exposeInPortal)
    }

    /**
     * @throws ApiVersionNotFoundException バージョンが存在しない、または非公開の場合
     */
    async getApiVersionPolicies(
        organizationId: string,
        apiId: string,
        version: string
    ): Promise<ApiVersionPolicySummary[]> {
        await this.apiService.getExposedApiVersion(organizationId, apiId, version)
        return tryAction(() => this.catalog.listApiVersionPolicies(organizationId, apiId, version))
    }

    /**
     * API プランへの利用を申請する
     *
     * 【処理の流れ】
     * 1. バージョンが公開されていることを確認
     * 2. プランがそのバージョンに属していることを確認
     * 3. ApiSignupEvent を発行（承認が必要なら通知コンテキストが承認者に知らせる）
     *
     * @throws ApiVersionNotFoundException バージョンが存在しない、または非公開の場合
     * @throws PlanNotFoundException プランがバージョンに属していない場合
     */
    async requestApiSignup(
        organizationId: string,
        apiId: string,
        version: string,
        planId: string,
        requestedBy: string
    ): Promise<ApiSignupResult> {
        const plans = await this.getApiVersionPlans(organizationId, apiId, version)
        const plan = plans.find((candidate) => candidate.planId === planId)

        if (!plan) {
            throw new PlanNotFoundException(planId)
        }

        await this.eventBus.publish(
            new ApiSignupEvent({
                organizationId,
                apiId,
                apiVersion: version,
                planId: plan.planId,
                planVersion: plan.version,
                requestedBy,
                approvalRequired: plan.requiresApproval,
            })
        )

        console.log(`✅ ${requestedBy} requested ${organizationId}/${apiId} ${version} (plan ${planId})`)

        return { approvalRequired: plan.requiresApproval }
    }
}
