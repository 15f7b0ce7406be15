import type { SecurityContext } from '../security/application/domain/model/SecurityContext'

export type { AppBindings } from '../config/bindings'

/**
 * Hono のコンテキスト型
 *
 * securityContext は authenticate ミドルウェアが設定する。
 */
export interface AppEnv {
    Variables: {
        securityContext: SecurityContext
    }
}
