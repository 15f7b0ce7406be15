import { ApplicationException } from '../exception/ApplicationException'
import { SystemErrorException } from '../exception/SystemErrorException'

/**
 * ストレージ呼び出しを実行し、失敗を SystemErrorException に変換する
 *
 * - ApplicationException はそのまま再スロー
 * - それ以外のエラーは SystemErrorException で包む（cause に元のエラー）
 *
 * @example
 * ```typescript
 * const count = await tryAction(() => this.repository.countUnread(userId))
 * ```
 */
export async function tryAction<T>(action: () => Promise<T>): Promise<T> {
    try {
        return await action()
    } catch (error) {
        if (error instanceof ApplicationException) {
            throw error
        }
        console.error('❌ Storage action failed:', error)
        throw new SystemErrorException(error)
    }
}
