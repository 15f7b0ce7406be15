import { describe, expect, it } from 'vitest'
import { InvalidConfigurationException } from '../../src/common/exception/InvalidConfigurationException'
import { loadBindings } from '../../src/config/bindings'

const required = { JWT_SECRET: 'test-secret', SSO_EVENT_TOKEN: 'test-sso-token' }

function captureError(action: () => unknown): unknown {
    try {
        action()
    } catch (error) {
        return error
    }
    throw new Error('Expected an error to be thrown')
}

describe('loadBindings', () => {
    it('必須項目だけで既定値が埋まること', () => {
        const bindings = loadBindings(required)

        expect(bindings).toMatchObject({
            USE_SUPABASE: false,
            ACCOUNT_APPROVAL_REQUIRED: true,
            EMAIL_FROM: 'API Portal <notifications@example.com>',
            EVENT_SOURCE_URL: 'http://localhost/api',
            PORT: 8787,
        })
        expect(bindings.RESEND_API_KEY).toBeUndefined()
    })

    it('文字列の値を型付きの値に変換すること', () => {
        const bindings = loadBindings({ ...required, PORT: '3000', ACCOUNT_APPROVAL_REQUIRED: 'false' })

        expect(bindings.PORT).toBe(3000)
        expect(bindings.ACCOUNT_APPROVAL_REQUIRED).toBe(false)
    })

    it('空文字の変数は未設定として扱うこと', () => {
        expect(loadBindings({ ...required, RESEND_API_KEY: '' }).RESEND_API_KEY).toBeUndefined()
    })

    it('必須項目がない場合はそのキーを含む例外を投げること', () => {
        const error = captureError(() => loadBindings({ SSO_EVENT_TOKEN: 'test-sso-token' }))

        expect(error).toBeInstanceOf(InvalidConfigurationException)
        expect(error).toMatchObject({ keys: ['JWT_SECRET'] })
    })

    it('USE_SUPABASE=true では接続情報が必須であること', () => {
        const error = captureError(() => loadBindings({ ...required, USE_SUPABASE: 'true' }))

        expect(error).toMatchObject({ keys: ['SUPABASE_URL', 'SUPABASE_PUBLISHABLE_KEY'] })
    })

    it('true / false 以外のフラグは不正とすること', () => {
        const error = captureError(() => loadBindings({ ...required, USE_SUPABASE: 'yes' }))

        expect(error).toMatchObject({ keys: ['USE_SUPABASE'] })
    })
})
