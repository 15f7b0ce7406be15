/**
 * アプリケーション例外の基底クラス
 *
 * tryAction() はこのクラスのサブクラスをそのまま伝播させ、
 * それ以外（ストレージや外部 API の失敗）を SystemErrorException で包む。
 */
export abstract class ApplicationException extends Error {
    protected constructor(message: string, options?: ErrorOptions) {
        super(message, options)
    }
}
