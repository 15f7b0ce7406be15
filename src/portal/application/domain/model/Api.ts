/**
 * ポータルに表示する API の概要
 */
export interface ApiSummary {
    organizationId: string
    organizationName: string
    id: string
    name: string
    description: string
    createdOn: Date
    featured: boolean
}

/**
 * API バージョンのライフサイクル
 */
export type ApiVersionStatus = 'Created' | 'Ready' | 'Published' | 'Retired'

/**
 * API バージョンの一覧用サマリー
 */
export interface ApiVersionSummary {
    organizationId: string
    apiId: string
    version: string
    status: ApiVersionStatus
    exposeInPortal: boolean
    createdOn: Date
}

/**
 * API バージョンの詳細
 */
export interface ApiVersion extends ApiVersionSummary {
    description: string
    definitionType: ApiDefinitionType
    endpoint: string | null
    publishedOn: Date | null
}

/**
 * API 定義の種類
 */
export type ApiDefinitionType =
    | 'None'
    | 'SwaggerJSON'
    | 'SwaggerYAML'
    | 'WSDL'
    | 'WADL'
    | 'RAML'

export const API_DEFINITION_TYPES = [
    'None',
    'SwaggerJSON',
    'SwaggerYAML',
    'WSDL',
    'WADL',
    'RAML',
] as const satisfies readonly ApiDefinitionType[]

const MEDIA_TYPES: Record<Exclude<ApiDefinitionType, 'None'>, string> = {
    SwaggerJSON: 'application/json',
    SwaggerYAML: 'application/x-yaml',
    WSDL: 'application/wsdl+xml',
    WADL: 'application/vnd.sun.wadl+xml',
    RAML: 'application/raml+yaml',
}

/**
 * 定義の種類に対応する Content-Type
 */
export function mediaTypeOf(definitionType: Exclude<ApiDefinitionType, 'None'>): string {
    return MEDIA_TYPES[definitionType]
}

/**
 * レスポンスとして返す API 定義
 */
export interface ApiDefinitionStream {
    definitionType: Exclude<ApiDefinitionType, 'None'>
    mediaType: string
    definition: string
}

/**
 * 開発者向けのプラン概要
 */
export interface DeveloperApiPlanSummary {
    planId: string
    planName: string
    planDescription: string
    version: string
    requiresApproval: boolean
    exposeInPortal: boolean
}

/**
 * API バージョンに設定されたポリシーの概要（orderIndex 順に適用される）
 */
export interface ApiVersionPolicySummary {
    policyDefinitionId: string
    name: string
    description: string
    icon: string | null
    orderIndex: number
}
