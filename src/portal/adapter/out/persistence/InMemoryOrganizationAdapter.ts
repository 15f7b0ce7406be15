import { injectable } from 'tsyringe'
import { OrganizationAlreadyExistsException } from '../../../application/domain/exception/OrganizationAlreadyExistsException'
import type { Organization } from '../../../application/domain/model/Organization'
import type { OrganizationPort } from '../../../application/port/out/OrganizationPort'

/**
 * インメモリの組織ストア
 * 開発・テスト用の簡易実装
 */
@injectable()
export class InMemoryOrganizationAdapter implements OrganizationPort {
    private organizations = new Map<string, Organization>()

    findOrganization(organizationId: string): Promise<Organization | null> {
        const organization = this.organizations.get(organizationId)
        return Promise.resolve(organization ? { ...organization } : null)
    }

    createOrganization(organization: Organization): Promise<Organization> {
        if (this.organizations.has(organization.id)) {
            return Promise.reject(new OrganizationAlreadyExistsException(organization.id))
        }
        this.organizations.set(organization.id, { ...organization })
        return Promise.resolve({ ...organization })
    }

    clear(): void {
        this.organizations.clear()
    }
}
