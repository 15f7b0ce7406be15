import { inject, injectable } from 'tsyringe'
import { tryAction } from '../../../common/util/tryAction'
import { ApiDefinitionNotFoundException } from '../domain/exception/ApiDefinitionNotFoundException'
import { ApiNotFoundException } from '../domain/exception/ApiNotFoundException'
import { ApiVersionNotFoundException } from '../domain/exception/ApiVersionNotFoundException'
import type { ApiDefinitionStream, ApiSummary, ApiVersion, ApiVersionSummary } from '../domain/model/Api'
import { mediaTypeOf } from '../domain/model/Api'
import type { ApiCatalogPort } from '../port/out/ApiCatalogPort'
import { ApiCatalogPortToken } from '../port/out/ApiCatalogPort'

/**
 * API カタログの参照サービス
 */
@injectable()
export class ApiService {
    constructor(
        @inject(ApiCatalogPortToken)
        private readonly catalog: ApiCatalogPort
    ) {}

    getFeaturedApis(): Promise<ApiSummary[]> {
        return tryAction(() => this.catalog.findFeaturedApis())
    }

    /**
     * @throws ApiNotFoundException API が存在しない場合
     */
    async listApiVersions(organizationId: string, apiId: string): Promise<ApiVersionSummary[]> {
        const api = await tryAction(() => this.catalog.findApi(organizationId, apiId))
        if (!api) {
            throw new ApiNotFoundException(organizationId, apiId)
        }
        return tryAction(() => this.catalog.listApiVersions(organizationId, apiId))
    }

    /**
     * @throws ApiVersionNotFoundException バージョンが存在しない場合
     */
    async getApiVersion(organizationId: string, apiId: string, version: string): Promise<ApiVersion> {
        const apiVersion = await tryAction(() =>
            this.catalog.findApiVersion(organizationId, apiId, version)
        )
        if (!apiVersion) {
            throw new ApiVersionNotFoundException(apiId, version)
        }
        return apiVersion
    }

    /**
     * ポータルに公開されているバージョンだけを返す
     *
     * @throws ApiVersionNotFoundException 存在しない、または非公開の場合
     */
    async getExposedApiVersion(organizationId: string, apiId: string, version: string): Promise<ApiVersion> {
        const apiVersion = await this.getApiVersion(organizationId, apiId, version)
        if (!apiVersion.exposeInPortal) {
            throw new ApiVersionNotFoundException(apiId, version)
        }
        return apiVersion
    }

    /**
     * @throws ApiVersionNotFoundException バージョンが存在しない場合
     * @throws ApiDefinitionNotFoundException 定義が登録されていない場合
     */
    async getApiDefinition(organizationId: string, apiId: string, version: string): Promise<ApiDefinitionStream> {
        const apiVersion = await this.getApiVersion(organizationId, apiId, version)
        const { definitionType } = apiVersion

        if (definitionType === 'None') {
            throw new ApiDefinitionNotFoundException(apiId, version)
        }

        const definition = await tryAction(() =>
            this.catalog.findApiDefinition(organizationId, apiId, version)
        )
        if (definition === null) {
            throw new ApiDefinitionNotFoundException(apiId, version)
        }

        return {
            definitionType,
            mediaType: mediaTypeOf(definitionType),
            definition,
        }
    }
}
