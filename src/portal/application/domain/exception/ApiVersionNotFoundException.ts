import { ApplicationException } from '../../../../common/exception/ApplicationException'

/**
 * API バージョンが存在しない、またはポータルに公開されていない場合の例外
 *
 * 非公開のバージョンも「存在しない」として扱い、存在を漏らさない。
 */
export class ApiVersionNotFoundException extends ApplicationException {
    constructor(
        public readonly apiId: string,
        public readonly version: string
    ) {
        super(`API version not found: ${apiId} ${version}`)
        this.name = 'ApiVersionNotFoundException'
    }
}
