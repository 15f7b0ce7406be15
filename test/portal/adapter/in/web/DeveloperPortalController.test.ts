import 'reflect-metadata'

import type { Hono } from 'hono'
import { beforeEach, describe, expect, it } from 'vitest'
import { resetApplication } from '../../../../../src/config/app-initializer'
import { HOME_ORG_RESTRICTION_MESSAGE } from '../../../../../src/portal/adapter/in/web/DeveloperPortalController'
import type { AppEnv } from '../../../../../src/types/bindings'
import { createTestApp, jsonRequest } from '../../../../helpers/app'
import { bearerFor } from '../../../../helpers/fixtures'

/**
 * DeveloperPortalController の統合テスト（Webアダプタ層 + インメモリアダプター）
 *
 * 【テスト戦略】
 * - app.request() で実際の HTTP リクエストをシミュレート
 *   → ルーティング、認証ミドルウェア、バリデーションが実際に動作する
 * - サービスはモック化しない
 * - API カタログは InMemoryApiCatalogAdapter の初期データを使う
 */
describe('DeveloperPortalController', () => {
    let app: Hono<AppEnv>

    const WEATHER_1_0 = '/api/devportal/organizations/acme/apis/weather/versions/1.0'

    beforeEach(() => {
        resetApplication()
        app = createTestApp()
    })

    describe('API の検索と参照（匿名でも可）', () => {
        it('GET /api/devportal/apis/featured はおすすめ API を返すこと', async () => {
            const res = await app.request('/api/devportal/apis/featured')

            expect(res.status).toBe(200)
            expect(await res.json()).toMatchObject([{ name: 'Geo Lookup' }, { name: 'Weather Forecast' }])
        })

        it('POST /api/devportal/search/apis は条件に合う API を返すこと', async () => {
            const res = await app.request(
                '/api/devportal/search/apis',
                jsonRequest('POST', { filters: [{ name: 'organizationId', value: 'acme', operator: 'eq' }] })
            )

            expect(res.status).toBe(200)
            expect(await res.json()).toMatchObject({ totalSize: 1, beans: [{ id: 'weather' }] })
        })

        it('未知の検索フィールドなら 400 INVALID_SEARCH_CRITERIA を返すこと', async () => {
            const res = await app.request(
                '/api/devportal/search/apis',
                jsonRequest('POST', { filters: [{ name: 'owner', value: 'x', operator: 'eq' }] })
            )

            expect(res.status).toBe(400)
            expect(await res.json()).toEqual({
                success: false,
                message: 'Invalid search filter field: owner',
                error: { code: 'INVALID_SEARCH_CRITERIA' },
            })
        })

        it('未知の演算子なら 400 VALIDATION_ERROR を返すこと', async () => {
            const res = await app.request(
                '/api/devportal/search/apis',
                jsonRequest('POST', { filters: [{ name: 'name', value: 'x', operator: 'gt' }] })
            )

            expect(res.status).toBe(400)
            expect(await res.json()).toMatchObject({
                success: false,
                error: { code: 'VALIDATION_ERROR' },
            })
        })

        it('バージョン一覧は公開バージョンだけを返すこと', async () => {
            const res = await app.request('/api/devportal/organizations/acme/apis/weather/versions')

            expect(res.status).toBe(200)
            expect(await res.json()).toMatchObject([{ version: '1.0', exposeInPortal: true }])
        })

        it('API が存在しなければ 404 API_NOT_FOUND を返すこと', async () => {
            const res = await app.request('/api/devportal/organizations/acme/apis/unknown/versions')

            expect(res.status).toBe(404)
            expect(await res.json()).toEqual({
                success: false,
                message: 'API not found: acme/unknown',
                error: { code: 'API_NOT_FOUND', details: { organizationId: 'acme', apiId: 'unknown' } },
            })
        })

        it('非公開のバージョンは 404 API_VERSION_NOT_FOUND を返すこと', async () => {
            const res = await app.request('/api/devportal/organizations/acme/apis/weather/versions/2.0-beta')

            expect(res.status).toBe(404)
            expect(await res.json()).toMatchObject({ error: { code: 'API_VERSION_NOT_FOUND' } })
        })

        it('プランはポータルに表示するものだけを返すこと', async () => {
            const res = await app.request(`${WEATHER_1_0}/plans`)

            expect(res.status).toBe(200)
            expect(await res.json()).toMatchObject([{ planId: 'gold' }, { planId: 'bronze' }])
        })

        it('ポリシーを適用順に返すこと', async () => {
            const res = await app.request(`${WEATHER_1_0}/policies`)

            expect(await res.json()).toMatchObject([
                { policyDefinitionId: 'RateLimitingPolicy' },
                { policyDefinitionId: 'CachingPolicy' },
            ])
        })

        it('API 定義をその種類の Content-Type で返すこと', async () => {
            const res = await app.request('/api/devportal/organizations/globex/apis/geo/versions/3.1/definition')

            expect(res.status).toBe(200)
            expect(res.headers.get('Content-Type')).toBe('application/x-yaml')
            expect(await res.text()).toBe('openapi: 3.0.0\ninfo:\n  title: Geo Lookup\n  version: "3.1"\n')
        })

        it('非公開バージョンの定義は返さないこと', async () => {
            const res = await app.request(
                '/api/devportal/organizations/acme/apis/weather/versions/2.0-beta/definition'
            )

            expect(res.status).toBe(404)
            expect(await res.json()).toMatchObject({ error: { code: 'API_VERSION_NOT_FOUND' } })
        })
    })

    describe('POST /api/devportal/organizations', () => {
        it('匿名なら 401 を返すこと', async () => {
            const res = await app.request('/api/devportal/organizations', jsonRequest('POST', { name: 'bob' }))

            expect(res.status).toBe(401)
            expect(await res.json()).toMatchObject({ error: { code: 'NOT_AUTHENTICATED' } })
        })

        it('匿名なら本文が不正でも検証より先に 401 を返すこと', async () => {
            const res = await app.request('/api/devportal/organizations', jsonRequest('POST', {}))

            expect(res.status).toBe(401)
            expect(await res.json()).toMatchObject({ error: { code: 'NOT_AUTHENTICATED' } })
        })

        it('ユーザー名と違う組織名なら 403 を返すこと', async () => {
            const res = await app.request(
                '/api/devportal/organizations',
                jsonRequest('POST', { name: 'alice' }, await bearerFor('bob'))
            )

            expect(res.status).toBe(403)
            expect(await res.json()).toEqual({
                success: false,
                message: HOME_ORG_RESTRICTION_MESSAGE,
                error: { code: 'NOT_AUTHORIZED' },
            })
        })

        it('ホーム組織を作成し、2回目は 409 を返すこと', async () => {
            const headers = await bearerFor('bob')

            const first = await app.request(
                '/api/devportal/organizations',
                jsonRequest('POST', { name: 'bob', description: 'Home of bob' }, headers)
            )

            expect(first.status).toBe(200)
            expect(await first.json()).toMatchObject({
                id: 'bob',
                name: 'bob',
                description: 'Home of bob',
                createdBy: 'bob',
            })

            const second = await app.request('/api/devportal/organizations', jsonRequest('POST', { name: 'bob' }, headers))

            expect(second.status).toBe(409)
            expect(await second.json()).toMatchObject({
                error: { code: 'ORGANIZATION_ALREADY_EXISTS', details: { organizationId: 'bob' } },
            })
        })

        it('組織名が空なら 400 VALIDATION_ERROR を返すこと', async () => {
            const res = await app.request(
                '/api/devportal/organizations',
                jsonRequest('POST', { name: '' }, await bearerFor('bob'))
            )

            expect(res.status).toBe(400)
            expect(await res.json()).toMatchObject({ error: { code: 'VALIDATION_ERROR' } })
        })
    })

    describe('POST .../plans/:planId/signup', () => {
        it('匿名なら 401 を返すこと', async () => {
            const res = await app.request(`${WEATHER_1_0}/plans/gold/signup`, { method: 'POST' })

            expect(res.status).toBe(401)
        })

        it('承認が必要なプランなら 202 を返し、API 承認者に通知すること', async () => {
            const res = await app.request(`${WEATHER_1_0}/plans/gold/signup`, {
                method: 'POST',
                headers: await bearerFor('bob'),
            })

            expect(res.status).toBe(202)
            expect(await res.json()).toEqual({
                success: true,
                message: 'Signup request submitted for approval',
                data: {
                    organizationId: 'acme',
                    apiId: 'weather',
                    version: '1.0',
                    planId: 'gold',
                    approvalRequired: true,
                },
            })

            const count = await app.request('/api/notifications/count', { headers: await bearerFor('admin') })
            expect(await count.json()).toEqual({ count: 1 })
        })

        it('承認不要のプランなら通知しないこと', async () => {
            const res = await app.request(`${WEATHER_1_0}/plans/bronze/signup`, {
                method: 'POST',
                headers: await bearerFor('bob'),
            })

            expect(res.status).toBe(202)
            expect(await res.json()).toMatchObject({
                message: 'Signup request accepted',
                data: { approvalRequired: false },
            })

            const count = await app.request('/api/notifications/count', { headers: await bearerFor('admin') })
            expect(await count.json()).toEqual({ count: 0 })
        })

        it('ポータルに表示しないプランは 404 PLAN_NOT_FOUND を返すこと', async () => {
            const res = await app.request(`${WEATHER_1_0}/plans/internal/signup`, {
                method: 'POST',
                headers: await bearerFor('bob'),
            })

            expect(res.status).toBe(404)
            expect(await res.json()).toMatchObject({
                error: { code: 'PLAN_NOT_FOUND', details: { planId: 'internal' } },
            })
        })
    })
})
