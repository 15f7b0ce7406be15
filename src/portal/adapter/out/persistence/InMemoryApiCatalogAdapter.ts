import { injectable } from 'tsyringe'
import { applyCriteria } from '../../../../common/search/InMemorySearch'
import type { SearchCriteria } from '../../../../common/search/SearchCriteria'
import type { SearchResults } from '../../../../common/search/SearchResults'
import type {
    ApiSummary,
    ApiVersion,
    ApiVersionPolicySummary,
    ApiVersionSummary,
    DeveloperApiPlanSummary,
} from '../../../application/domain/model/Api'
import { apiSummaryField } from '../../../application/domain/model/ApiSearch'
import type { ApiCatalogPort } from '../../../application/port/out/ApiCatalogPort'

/**
 * バージョンに紐づくデータ（インメモリストア用）
 */
interface ApiVersionData {
    version: ApiVersion
    plans: DeveloperApiPlanSummary[]
    policies: ApiVersionPolicySummary[]
    definition: string | null
}

export type ApiVersionContents = Partial<Omit<ApiVersionData, 'version'>>

function apiKey(organizationId: string, apiId: string): string {
    return `${organizationId}/${apiId}`
}

function versionKey(organizationId: string, apiId: string, version: string): string {
    return `${organizationId}/${apiId}/${version}`
}

function toSummary(version: ApiVersion): ApiVersionSummary {
    return {
        organizationId: version.organizationId,
        apiId: version.apiId,
        version: version.version,
        status: version.status,
        exposeInPortal: version.exposeInPortal,
        createdOn: version.createdOn,
    }
}

/**
 * インメモリの API カタログ
 * 開発・テスト用の簡易実装
 */
@injectable()
export class InMemoryApiCatalogAdapter implements ApiCatalogPort {
    private apis = new Map<string, ApiSummary>()
    private versions = new Map<string, ApiVersionData>()

    constructor() {
        this.initializeTestData()
    }

    /**
     * テストデータの初期化
     *
     * - acme/weather: おすすめ。1.0 は公開（プラン gold/bronze/internal）、2.0-beta は非公開
     * - acme/billing: 公開バージョンなし
     * - globex/geo: おすすめ。3.1 は公開（プラン free）
     */
    private initializeTestData(): void {
        this.addApi({
            organizationId: 'acme',
            organizationName: 'Acme',
            id: 'weather',
            name: 'Weather Forecast',
            description: 'Hourly and daily forecasts',
            createdOn: new Date('2024-01-05T00:00:00Z'),
            featured: true,
        })
        this.addApiVersion(
            {
                organizationId: 'acme',
                apiId: 'weather',
                version: '1.0',
                status: 'Published',
                exposeInPortal: true,
                createdOn: new Date('2024-01-10T00:00:00Z'),
                description: 'First public release',
                definitionType: 'SwaggerJSON',
                endpoint: 'https://gateway.example.com/acme/weather/1.0',
                publishedOn: new Date('2024-01-15T00:00:00Z'),
            },
            {
                plans: [
                    {
                        planId: 'gold',
                        planName: 'Gold',
                        planDescription: 'Unlimited requests',
                        version: '1',
                        requiresApproval: true,
                        exposeInPortal: true,
                    },
                    {
                        planId: 'bronze',
                        planName: 'Bronze',
                        planDescription: '1000 requests per day',
                        version: '1',
                        requiresApproval: false,
                        exposeInPortal: true,
                    },
                    {
                        planId: 'internal',
                        planName: 'Internal',
                        planDescription: 'For internal consumers',
                        version: '1',
                        requiresApproval: false,
                        exposeInPortal: false,
                    },
                ],
                policies: [
                    {
                        policyDefinitionId: 'CachingPolicy',
                        name: 'Caching',
                        description: 'Caches responses for 60 seconds',
                        icon: 'hdd-o',
                        orderIndex: 2,
                    },
                    {
                        policyDefinitionId: 'RateLimitingPolicy',
                        name: 'Rate Limiting',
                        description: 'Limits requests per consumer',
                        icon: 'sliders',
                        orderIndex: 1,
                    },
                ],
                definition: '{"openapi":"3.0.0","info":{"title":"Weather Forecast","version":"1.0"}}',
            }
        )
        this.addApiVersion({
            organizationId: 'acme',
            apiId: 'weather',
            version: '2.0-beta',
            status: 'Created',
            exposeInPortal: false,
            createdOn: new Date('2024-03-01T00:00:00Z'),
            description: 'Next generation forecasts',
            definitionType: 'None',
            endpoint: null,
            publishedOn: null,
        })

        this.addApi({
            organizationId: 'acme',
            organizationName: 'Acme',
            id: 'billing',
            name: 'Billing',
            description: 'Invoices and payments',
            createdOn: new Date('2024-02-01T00:00:00Z'),
            featured: false,
        })
        this.addApiVersion({
            organizationId: 'acme',
            apiId: 'billing',
            version: '1.0',
            status: 'Ready',
            exposeInPortal: false,
            createdOn: new Date('2024-02-02T00:00:00Z'),
            description: 'Internal billing API',
            definitionType: 'None',
            endpoint: null,
            publishedOn: null,
        })

        this.addApi({
            organizationId: 'globex',
            organizationName: 'Globex',
            id: 'geo',
            name: 'Geo Lookup',
            description: 'Reverse geocoding',
            createdOn: new Date('2023-11-20T00:00:00Z'),
            featured: true,
        })
        this.addApiVersion(
            {
                organizationId: 'globex',
                apiId: 'geo',
                version: '3.1',
                status: 'Published',
                exposeInPortal: true,
                createdOn: new Date('2023-12-01T00:00:00Z'),
                description: 'Stable release',
                definitionType: 'SwaggerYAML',
                endpoint: 'https://gateway.example.com/globex/geo/3.1',
                publishedOn: new Date('2023-12-05T00:00:00Z'),
            },
            {
                plans: [
                    {
                        planId: 'free',
                        planName: 'Free',
                        planDescription: 'Community access',
                        version: '2',
                        requiresApproval: false,
                        exposeInPortal: true,
                    },
                ],
                definition: 'openapi: 3.0.0\ninfo:\n  title: Geo Lookup\n  version: "3.1"\n',
            }
        )
    }

    addApi(api: ApiSummary): void {
        this.apis.set(apiKey(api.organizationId, api.id), { ...api })
    }

    addApiVersion(version: ApiVersion, contents: ApiVersionContents = {}): void {
        this.versions.set(versionKey(version.organizationId, version.apiId, version.version), {
            version: { ...version },
            plans: contents.plans ?? [],
            policies: contents.policies ?? [],
            definition: contents.definition ?? null,
        })
    }

    clear(): void {
        this.apis.clear()
        this.versions.clear()
    }

    searchExposedApis(criteria: SearchCriteria): Promise<SearchResults<ApiSummary>> {
        return Promise.resolve(applyCriteria(this.exposedApis(), criteria, apiSummaryField))
    }

    findFeaturedApis(): Promise<ApiSummary[]> {
        return Promise.resolve(this.exposedApis().filter((api) => api.featured))
    }

    findApi(organizationId: string, apiId: string): Promise<ApiSummary | null> {
        const api = this.apis.get(apiKey(organizationId, apiId))
        return Promise.resolve(api ? { ...api } : null)
    }

    listApiVersions(organizationId: string, apiId: string): Promise<ApiVersionSummary[]> {
        const versions = this.versionsOf(organizationId, apiId)
            .map((data) => toSummary(data.version))
            .sort((a, b) => b.createdOn.getTime() - a.createdOn.getTime())
        return Promise.resolve(versions)
    }

    findApiVersion(organizationId: string, apiId: string, version: string): Promise<ApiVersion | null> {
        const data = this.versions.get(versionKey(organizationId, apiId, version))
        return Promise.resolve(data ? { ...data.version } : null)
    }

    listApiVersionPlans(
        organizationId: string,
        apiId: string,
        version: string
    ): Promise<DeveloperApiPlanSummary[]> {
        const data = this.versions.get(versionKey(organizationId, apiId, version))
        return Promise.resolve((data?.plans ?? []).map((plan) => ({ ...plan })))
    }

    listApiVersionPolicies(
        organizationId: string,
        apiId: string,
        version: string
    ): Promise<ApiVersionPolicySummary[]> {
        const data = this.versions.get(versionKey(organizationId, apiId, version))
        const policies = (data?.policies ?? [])
            .map((policy) => ({ ...policy }))
            .sort((a, b) => a.orderIndex - b.orderIndex)
        return Promise.resolve(policies)
    }

    findApiDefinition(organizationId: string, apiId: string, version: string): Promise<string | null> {
        const data = this.versions.get(versionKey(organizationId, apiId, version))
        return Promise.resolve(data?.definition ?? null)
    }

    /**
     * 公開バージョンを持つ API（名前順）
     */
    private exposedApis(): ApiSummary[] {
        return Array.from(this.apis.values())
            .filter((api) =>
                this.versionsOf(api.organizationId, api.id).some((data) => data.version.exposeInPortal)
            )
            .map((api) => ({ ...api }))
            .sort((a, b) => a.name.localeCompare(b.name))
    }

    private versionsOf(organizationId: string, apiId: string): ApiVersionData[] {
        return Array.from(this.versions.values()).filter(
            (data) => data.version.organizationId === organizationId && data.version.apiId === apiId
        )
    }
}
