import { zValidator } from '@hono/zod-validator'
import { Hono } from 'hono'
import { container } from 'tsyringe'
import { toErrorWebResponse, validationHook } from '../../../../common/adapter/in/web/ErrorMapper'
import { NotAuthorizedException } from '../../../../common/exception/NotAuthorizedException'
import { SearchCriteriaSchema } from '../../../../common/search/SearchCriteria'
import { requireLogin } from '../../../../security/adapter/in/web/authenticate'
import type { AppEnv } from '../../../../types/bindings'
import { ApiService } from '../../../application/service/ApiService'
import { DevPortalService } from '../../../application/service/DevPortalService'
import { OrganizationService } from '../../../application/service/OrganizationService'
import type { ApiSignupWebResponse } from './models/ApiSignupWebResponse'
import { NewOrganizationWebRequestSchema } from './models/NewOrganizationWebRequest'

const VERSION_PATH = '/devportal/organizations/:orgId/apis/:apiId/versions/:version'

export const HOME_ORG_RESTRICTION_MESSAGE =
    "A developer's default org must be the same as their username. This restriction may be lifted later."

export const developerPortalRouter = new Hono<AppEnv>()

/**
 * POST /api/devportal/search/apis
 * 公開バージョンを持つ API を検索する
 */
developerPortalRouter.post(
    '/devportal/search/apis',
    zValidator('json', SearchCriteriaSchema, validationHook),
    async (c): Promise<Response> => {
        try {
            const criteria = c.req.valid('json')
            console.debug('🔎 Searching exposed APIs:', JSON.stringify(criteria))

            const results = await container.resolve(DevPortalService).findExposedApis(criteria)
            return c.json(results, 200)
        } catch (error) {
            return toErrorWebResponse(c, error)
        }
    }
)

/**
 * GET /api/devportal/apis/featured
 */
developerPortalRouter.get('/devportal/apis/featured', async (c): Promise<Response> => {
    try {
        const apis = await container.resolve(ApiService).getFeaturedApis()
        return c.json(apis, 200)
    } catch (error) {
        return toErrorWebResponse(c, error)
    }
})

/**
 * GET /api/devportal/organizations/:orgId/apis/:apiId/versions
 * ポータルに公開されたバージョンだけを返す
 */
developerPortalRouter.get(
    '/devportal/organizations/:orgId/apis/:apiId/versions',
    async (c): Promise<Response> => {
        try {
            const { orgId, apiId } = c.req.param()
            const versions = await container.resolve(ApiService).listApiVersions(orgId, apiId)
            return c.json(
                versions.filter((version) => version.exposeInPortal),
                200
            )
        } catch (error) {
            return toErrorWebResponse(c, error)
        }
    }
)

/**
 * GET /api/devportal/organizations/:orgId/apis/:apiId/versions/:version
 */
developerPortalRouter.get(VERSION_PATH, async (c): Promise<Response> => {
    try {
        const { orgId, apiId, version } = c.req.param()
        const apiVersion = await container.resolve(ApiService).getExposedApiVersion(orgId, apiId, version)
        return c.json(apiVersion, 200)
    } catch (error) {
        return toErrorWebResponse(c, error)
    }
})

/**
 * GET .../versions/:version/plans
 */
developerPortalRouter.get(`${VERSION_PATH}/plans`, async (c): Promise<Response> => {
    try {
        const { orgId, apiId, version } = c.req.param()
        const plans = await container.resolve(DevPortalService).getApiVersionPlans(orgId, apiId, version)
        return c.json(plans, 200)
    } catch (error) {
        return toErrorWebResponse(c, error)
    }
})

/**
 * GET .../versions/:version/policies
 */
developerPortalRouter.get(`${VERSION_PATH}/policies`, async (c): Promise<Response> => {
    try {
        const { orgId, apiId, version } = c.req.param()
        const policies = await container
            .resolve(DevPortalService)
            .getApiVersionPolicies(orgId, apiId, version)
        return c.json(policies, 200)
    } catch (error) {
        return toErrorWebResponse(c, error)
    }
})

/**
 * GET .../versions/:version/definition
 * 定義本文をその種類の Content-Type で返す
 */
developerPortalRouter.get(`${VERSION_PATH}/definition`, async (c): Promise<Response> => {
    try {
        const { orgId, apiId, version } = c.req.param()
        const apiService = container.resolve(ApiService)

        // 非公開バージョンの定義は返さない
        await apiService.getExposedApiVersion(orgId, apiId, version)
        const definition = await apiService.getApiDefinition(orgId, apiId, version)

        return c.body(definition.definition, 200, { 'Content-Type': definition.mediaType })
    } catch (error) {
        return toErrorWebResponse(c, error)
    }
})

/**
 * POST /api/devportal/organizations
 * 開発者のホーム組織を作成する（組織名はユーザー名と同じであること）
 */
developerPortalRouter.post(
    '/devportal/organizations',
    requireLogin,
    zValidator('json', NewOrganizationWebRequestSchema, validationHook),
    async (c): Promise<Response> => {
        try {
            const request = c.req.valid('json')
            const currentUser = c.get('securityContext').requireCurrentUser()

            if (request.name !== currentUser) {
                throw new NotAuthorizedException(HOME_ORG_RESTRICTION_MESSAGE)
            }

            const organization = await container.resolve(OrganizationService).createOrg(request, currentUser)
            return c.json(organization, 200)
        } catch (error) {
            return toErrorWebResponse(c, error)
        }
    }
)

/**
 * POST .../versions/:version/plans/:planId/signup
 * API プランの利用を申請する（承認は非同期なので 202）
 */
developerPortalRouter.post(`${VERSION_PATH}/plans/:planId/signup`, requireLogin, async (c): Promise<Response> => {
    try {
        const { orgId, apiId, version, planId } = c.req.param()
        const currentUser = c.get('securityContext').requireCurrentUser()

        const result = await container
            .resolve(DevPortalService)
            .requestApiSignup(orgId, apiId, version, planId, currentUser)

        const response: ApiSignupWebResponse = {
            success: true,
            message: result.approvalRequired
                ? 'Signup request submitted for approval'
                : 'Signup request accepted',
            data: {
                organizationId: orgId,
                apiId,
                version,
                planId,
                approvalRequired: result.approvalRequired,
            },
        }
        return c.json(response, 202)
    } catch (error) {
        return toErrorWebResponse(c, error)
    }
})
