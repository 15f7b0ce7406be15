import { inject, injectable } from 'tsyringe'
import type { TypedSupabaseClient } from '../../../../config/types'
import { SupabaseClientToken } from '../../../../config/types'
import { OrganizationAlreadyExistsException } from '../../../application/domain/exception/OrganizationAlreadyExistsException'
import type { Organization } from '../../../application/domain/model/Organization'
import type { OrganizationPort } from '../../../application/port/out/OrganizationPort'
import { OrganizationRecordSchema } from './entities/OrganizationRecord'
import { toDomain, toRecord } from './mappers/OrganizationMapper'

/**
 * PostgreSQL の一意制約違反
 */
const UNIQUE_VIOLATION = '23505'

/**
 * Supabase の organizations テーブルを使った組織ストア
 */
@injectable()
export class SupabaseOrganizationAdapter implements OrganizationPort {
    constructor(
        @inject(SupabaseClientToken) private readonly supabase: TypedSupabaseClient
    ) {}

    async findOrganization(organizationId: string): Promise<Organization | null> {
        const { data, error } = await this.supabase
            .from('organizations')
            .select('*')
            .eq('id', organizationId)
            .maybeSingle()

        if (error) {
            throw new Error(`Failed to load organization: ${error.message}`)
        }

        return data === null ? null : toDomain(OrganizationRecordSchema.parse(data))
    }

    /**
     * 組織を挿入する
     *
     * 確認と挿入の間に同じ ID が作られた場合も一意制約違反として検出する。
     */
    async createOrganization(organization: Organization): Promise<Organization> {
        const { data, error } = await this.supabase
            .from('organizations')
            .insert(toRecord(organization))
            .select('*')

        if (error) {
            if (error.code === UNIQUE_VIOLATION) {
                throw new OrganizationAlreadyExistsException(organization.id)
            }
            throw new Error(`Failed to insert organization: ${error.message}`)
        }

        const [saved] = OrganizationRecordSchema.array().parse(data)
        if (!saved) {
            throw new Error('Failed to insert organization: no row returned')
        }

        return toDomain(saved)
    }
}
