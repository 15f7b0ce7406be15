import type {
    ApiSummary,
    ApiVersion,
    ApiVersionPolicySummary,
    ApiVersionSummary,
    DeveloperApiPlanSummary,
} from '../../../../application/domain/model/Api'
import type { ApiSearchField } from '../../../../application/domain/model/ApiSearch'
import type {
    ApiPlanRecord,
    ApiPolicyRecord,
    ApiRecord,
    ApiVersionRecord,
} from '../entities/ApiCatalogRecord'

/**
 * 永続化層とドメイン層の間で API カタログを変換するマッパー
 */

/**
 * 検索フィールドとカラムの対応
 */
export const API_SEARCH_COLUMNS: Record<ApiSearchField, keyof ApiRecord> = {
    id: 'id',
    name: 'name',
    description: 'description',
    organizationId: 'organization_id',
    organizationName: 'organization_name',
}

export function toApiSummary(record: ApiRecord): ApiSummary {
    return {
        organizationId: record.organization_id,
        organizationName: record.organization_name,
        id: record.id,
        name: record.name,
        description: record.description ?? '',
        createdOn: new Date(record.created_on),
        featured: record.featured,
    }
}

export function toApiVersionSummary(record: ApiVersionRecord): ApiVersionSummary {
    return {
        organizationId: record.organization_id,
        apiId: record.api_id,
        version: record.version,
        status: record.status,
        exposeInPortal: record.expose_in_portal,
        createdOn: new Date(record.created_on),
    }
}

export function toApiVersion(record: ApiVersionRecord): ApiVersion {
    return {
        ...toApiVersionSummary(record),
        description: record.description ?? '',
        definitionType: record.definition_type,
        endpoint: record.endpoint,
        publishedOn: record.published_on === null ? null : new Date(record.published_on),
    }
}

export function toPlanSummary(record: ApiPlanRecord): DeveloperApiPlanSummary {
    return {
        planId: record.plan_id,
        planName: record.plan_name,
        planDescription: record.plan_description ?? '',
        version: record.plan_version,
        requiresApproval: record.requires_approval,
        exposeInPortal: record.expose_in_portal,
    }
}

export function toPolicySummary(record: ApiPolicyRecord): ApiVersionPolicySummary {
    return {
        policyDefinitionId: record.policy_definition_id,
        name: record.name,
        description: record.description ?? '',
        icon: record.icon,
        orderIndex: record.order_index,
    }
}
