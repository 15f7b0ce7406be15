import { ApplicationException } from '../../../../common/exception/ApplicationException'

/**
 * API バージョンに定義が登録されていない場合の例外
 */
export class ApiDefinitionNotFoundException extends ApplicationException {
    constructor(
        public readonly apiId: string,
        public readonly version: string
    ) {
        super(`API definition not found: ${apiId} ${version}`)
        this.name = 'ApiDefinitionNotFoundException'
    }
}
