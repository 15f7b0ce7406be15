import { inject, injectable } from 'tsyringe'
import { tryAction } from '../../../common/util/tryAction'
import { OrganizationAlreadyExistsException } from '../domain/exception/OrganizationAlreadyExistsException'
import type { NewOrganization, Organization } from '../domain/model/Organization'
import { organizationIdFromName } from '../domain/model/Organization'
import type { OrganizationPort } from '../port/out/OrganizationPort'
import { OrganizationPortToken } from '../port/out/OrganizationPort'

@injectable()
export class OrganizationService {
    constructor(
        @inject(OrganizationPortToken)
        private readonly organizations: OrganizationPort
    ) {}

    /**
     * 組織を作成する
     *
     * @throws OrganizationAlreadyExistsException 名前から作った ID が既に使われている場合
     */
    async createOrg(newOrganization: NewOrganization, createdBy: string): Promise<Organization> {
        const id = organizationIdFromName(newOrganization.name)

        const existing = await tryAction(() => this.organizations.findOrganization(id))
        if (existing) {
            throw new OrganizationAlreadyExistsException(id)
        }

        const created = await tryAction(() =>
            this.organizations.createOrganization({
                id,
                name: newOrganization.name,
                description: newOrganization.description ?? '',
                createdBy,
                createdOn: new Date(),
            })
        )

        console.log(`✅ Organization created: ${created.id} (by ${createdBy})`)
        return created
    }
}
