import { ApplicationException } from './ApplicationException'

/**
 * 予期しないシステムエラー（ストレージ障害など）
 *
 * 元のエラーは cause に保持する。
 */
export class SystemErrorException extends ApplicationException {
    constructor(cause: unknown) {
        const detail = cause instanceof Error ? cause.message : String(cause)
        super(`System error: ${detail}`, { cause })
        this.name = 'SystemErrorException'
    }
}
