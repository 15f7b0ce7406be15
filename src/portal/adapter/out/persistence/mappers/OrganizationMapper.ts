import type { Organization } from '../../../../application/domain/model/Organization'
import type { OrganizationRecord } from '../entities/OrganizationRecord'

export function toDomain(record: OrganizationRecord): Organization {
    return {
        id: record.id,
        name: record.name,
        description: record.description ?? '',
        createdBy: record.created_by,
        createdOn: new Date(record.created_on),
    }
}

export function toRecord(organization: Organization): OrganizationRecord {
    return {
        id: organization.id,
        name: organization.name,
        description: organization.description,
        created_by: organization.createdBy,
        created_on: organization.createdOn.toISOString(),
    }
}
