import 'reflect-metadata'
import { Hono } from 'hono'
import { container } from 'tsyringe'
import { initializeApplication } from './config/app-initializer'
import type { AppBindings } from './config/bindings'
import type { DatabaseConfig } from './config/types'
import { DatabaseConfigToken } from './config/types'
import { notificationRouter } from './notification/adapter/in/web/NotificationController'
import { developerPortalRouter } from './portal/adapter/in/web/DeveloperPortalController'
import { authenticate } from './security/adapter/in/web/authenticate'
import { createSsoEventRouter } from './sso/adapter/in/web/SsoEventController'
import type { AppEnv } from './types/bindings'

/**
 * Hono アプリケーションを作成する
 *
 * DIコンテナと各コンテキストの初期化もここで行う（2回目以降は何もしない）。
 */
export function createApp(bindings: AppBindings): Hono<AppEnv> {
    initializeApplication(bindings)

    const app = new Hono<AppEnv>()

    // ルートエンドポイント
    app.get('/', (c) => {
        return c.json({
            message: 'API Portal Manager - Developer portal and notifications with Hono + TypeScript',
            version: '1.0.0',
            endpoints: {
                searchApis: 'POST /api/devportal/search/apis',
                featuredApis: 'GET /api/devportal/apis/featured',
                apiVersions: 'GET /api/devportal/organizations/:orgId/apis/:apiId/versions',
                createHomeOrg: 'POST /api/devportal/organizations',
                apiSignup: 'POST /api/devportal/organizations/:orgId/apis/:apiId/versions/:version/plans/:planId/signup',
                notifications: 'GET|PUT /api/notifications',
                ssoNewAccount: 'POST /api/events/sso/new-account',
            },
        })
    })

    // ヘルスチェックエンドポイント
    app.get('/health', (c) => {
        if (!container.isRegistered(DatabaseConfigToken)) {
            return c.json({ status: 'healthy', database: { url: 'in-memory', connected: true } })
        }

        const config = container.resolve<DatabaseConfig>(DatabaseConfigToken)
        return c.json({
            status: 'healthy',
            database: {
                url: config.url.replace(/\/\/.*@/, '//***@'), // 認証情報をマスク
                connected: true,
            },
        })
    })

    // JWT 認証（SSO イベントは共有トークンで別に保護する）
    const requireJwt = authenticate(bindings.JWT_SECRET)
    app.use('/api/devportal/*', requireJwt)
    app.use('/api/notifications/*', requireJwt)

    // APIルーターをマウント
    app.route('/api', developerPortalRouter)
    app.route('/api', notificationRouter)
    app.route('/api', createSsoEventRouter(bindings.SSO_EVENT_TOKEN))

    return app
}
