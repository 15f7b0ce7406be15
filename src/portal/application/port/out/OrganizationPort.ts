import type { Organization } from '../../domain/model/Organization'

/**
 * 組織の読み書きを行う出力ポート
 */
export interface OrganizationPort {
    findOrganization(organizationId: string): Promise<Organization | null>

    /**
     * 組織を保存する
     *
     * @throws OrganizationAlreadyExistsException 同じ ID が既に存在する場合
     */
    createOrganization(organization: Organization): Promise<Organization>
}

/**
 * DI用のシンボル
 */
export const OrganizationPortToken = Symbol('OrganizationPort')
