import { describe, expect, it } from 'vitest'
import { NotAuthorizedException } from '../../../src/common/exception/NotAuthorizedException'
import { SystemErrorException } from '../../../src/common/exception/SystemErrorException'
import { tryAction } from '../../../src/common/util/tryAction'

describe('tryAction', () => {
    it('成功した場合は結果をそのまま返すこと', async () => {
        await expect(tryAction(() => Promise.resolve(42))).resolves.toBe(42)
    })

    it('アプリケーション例外はそのまま再スローすること', async () => {
        const error = new NotAuthorizedException('nope')

        await expect(tryAction(() => Promise.reject(error))).rejects.toBe(error)
    })

    it('それ以外のエラーは SystemErrorException で包み、cause に元のエラーを保持すること', async () => {
        const original = new Error('db down')

        const result = await tryAction(() => Promise.reject(original)).catch((error: unknown) => error)

        expect(result).toBeInstanceOf(SystemErrorException)
        expect(result).toMatchObject({ message: 'System error: db down', cause: original })
    })

    it('Error 以外の値で失敗した場合も SystemErrorException になること', async () => {
        await expect(tryAction(() => Promise.reject('boom'))).rejects.toThrow('System error: boom')
    })
})
