import 'reflect-metadata'

import { beforeEach, describe, expect, it } from 'vitest'
import { InMemoryOrganizationAdapter } from '../../../../src/portal/adapter/out/persistence/InMemoryOrganizationAdapter'
import { OrganizationAlreadyExistsException } from '../../../../src/portal/application/domain/exception/OrganizationAlreadyExistsException'
import { organizationIdFromName } from '../../../../src/portal/application/domain/model/Organization'
import { OrganizationService } from '../../../../src/portal/application/service/OrganizationService'

describe('OrganizationService', () => {
    let organizations: InMemoryOrganizationAdapter
    let service: OrganizationService

    beforeEach(() => {
        organizations = new InMemoryOrganizationAdapter()
        service = new OrganizationService(organizations)
    })

    it('名前から使えない文字を除いて ID を作ること', () => {
        expect(organizationIdFromName('Acme Corp!')).toBe('AcmeCorp')
        expect(organizationIdFromName('team-a_b.c')).toBe('team-a_b.c')
    })

    it('組織を作成して保存すること', async () => {
        const created = await service.createOrg({ name: 'Acme Corp!' }, 'alice')

        expect(created).toMatchObject({
            id: 'AcmeCorp',
            name: 'Acme Corp!',
            description: '',
            createdBy: 'alice',
        })
        expect(await organizations.findOrganization('AcmeCorp')).toEqual(created)
    })

    it('同じ ID の組織があれば OrganizationAlreadyExistsException をスローすること', async () => {
        await service.createOrg({ name: 'alice', description: 'home' }, 'alice')

        await expect(service.createOrg({ name: 'alice' }, 'alice')).rejects.toThrow(
            OrganizationAlreadyExistsException
        )
    })
})
