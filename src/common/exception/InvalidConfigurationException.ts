/**
 * 環境変数の設定が不正な場合の例外
 *
 * 起動時にのみ投げられるので ApplicationException にはしない。
 */
export class InvalidConfigurationException extends Error {
    public readonly keys: readonly string[]

    constructor(keys: readonly string[], details: string) {
        super(`Invalid configuration (${keys.join(', ')}): ${details}`)
        this.name = 'InvalidConfigurationException'
        this.keys = keys
    }
}
