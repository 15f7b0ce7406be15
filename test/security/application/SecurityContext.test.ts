import { describe, expect, it } from 'vitest'
import { NotAuthenticatedException } from '../../../src/common/exception/NotAuthenticatedException'
import { SecurityContext } from '../../../src/security/application/domain/model/SecurityContext'

describe('SecurityContext', () => {
    it('匿名ではログインしていないこと', () => {
        const context = SecurityContext.anonymous()

        expect(context.isLoggedIn()).toBe(false)
        expect(context.getCurrentUser()).toBeNull()
        expect(() => context.requireCurrentUser()).toThrow(NotAuthenticatedException)
    })

    it('ログイン中のユーザー名を返すこと', () => {
        const context = SecurityContext.forUser('alice')

        expect(context.isLoggedIn()).toBe(true)
        expect(context.requireCurrentUser()).toBe('alice')
    })
})
