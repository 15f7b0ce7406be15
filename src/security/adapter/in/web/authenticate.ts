import type { MiddlewareHandler } from 'hono'
import { verify } from 'hono/jwt'
import { z } from 'zod'
import { toErrorResponse, toErrorWebResponse } from '../../../../common/adapter/in/web/ErrorMapper'
import { NotAuthenticatedException } from '../../../../common/exception/NotAuthenticatedException'
import type { AppEnv } from '../../../../types/bindings'
import { SecurityContext } from '../../../application/domain/model/SecurityContext'

/**
 * SSO が発行する JWT のうち、このアプリが使うクレーム
 *
 * preferred_username があればそれをユーザー名とし、なければ sub を使う。
 */
const JwtClaimsSchema = z.object({
    sub: z.string().min(1),
    preferred_username: z.string().min(1).optional(),
})

/**
 * 認証ミドルウェア
 *
 * - Authorization ヘッダーなし → 匿名の SecurityContext
 * - Bearer トークンが有効 → ユーザーの SecurityContext
 * - トークンが不正 → 401
 *
 * ログイン必須かどうかは各ルート（サービス）が判断する。
 */
export function authenticate(secret: string): MiddlewareHandler<AppEnv> {
    return async (c, next) => {
        const header = c.req.header('Authorization')

        if (!header) {
            c.set('securityContext', SecurityContext.anonymous())
            await next()
            return
        }

        const match = /^Bearer\s+(\S+)$/i.exec(header)
        if (!match) {
            return c.json(toErrorResponse('Malformed Authorization header', 'NOT_AUTHENTICATED'), 401)
        }

        let payload: unknown
        try {
            payload = await verify(match[1], secret, 'HS256')
        } catch (error) {
            console.warn('⚠️  Rejected bearer token:', error instanceof Error ? error.message : error)
            return c.json(toErrorResponse('Invalid or expired token', 'NOT_AUTHENTICATED'), 401)
        }

        const claims = JwtClaimsSchema.safeParse(payload)
        if (!claims.success) {
            return c.json(toErrorResponse('Token is missing required claims', 'NOT_AUTHENTICATED'), 401)
        }

        const username = claims.data.preferred_username ?? claims.data.sub
        c.set('securityContext', SecurityContext.forUser(username))
        await next()
    }
}

/**
 * ログイン必須ルート用のミドルウェア
 *
 * リクエストの検証より前に置き、匿名アクセスには本文の内容に関係なく 401 を返す。
 */
export const requireLogin: MiddlewareHandler<AppEnv> = async (c, next) => {
    if (!c.get('securityContext').isLoggedIn()) {
        return toErrorWebResponse(c, new NotAuthenticatedException())
    }
    await next()
}
