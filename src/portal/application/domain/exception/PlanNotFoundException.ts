import { ApplicationException } from '../../../../common/exception/ApplicationException'

export class PlanNotFoundException extends ApplicationException {
    constructor(public readonly planId: string) {
        super(`Plan not found: ${planId}`)
        this.name = 'PlanNotFoundException'
    }
}
