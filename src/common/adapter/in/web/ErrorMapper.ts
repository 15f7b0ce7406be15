import type { Context } from 'hono'
import type { ZodError } from 'zod'
import { NotAuthenticatedException } from '../../../exception/NotAuthenticatedException'
import { NotAuthorizedException } from '../../../exception/NotAuthorizedException'
import { InvalidNotificationStatusException } from '../../../../notification/application/domain/exception/InvalidNotificationStatusException'
import { ApiDefinitionNotFoundException } from '../../../../portal/application/domain/exception/ApiDefinitionNotFoundException'
import { ApiNotFoundException } from '../../../../portal/application/domain/exception/ApiNotFoundException'
import { ApiVersionNotFoundException } from '../../../../portal/application/domain/exception/ApiVersionNotFoundException'
import { InvalidSearchCriteriaException } from '../../../../portal/application/domain/exception/InvalidSearchCriteriaException'
import { OrganizationAlreadyExistsException } from '../../../../portal/application/domain/exception/OrganizationAlreadyExistsException'
import { PlanNotFoundException } from '../../../../portal/application/domain/exception/PlanNotFoundException'

/**
 * Web層のエラーレスポンス
 */
export interface ErrorWebResponse {
    success: false
    message: string
    error: {
        code: string
        details?: Record<string, unknown>
    }
}

type ErrorStatus = 400 | 401 | 403 | 404 | 409 | 500

interface MappedError {
    status: ErrorStatus
    body: ErrorWebResponse
}

/**
 * エラーレスポンスを作成
 */
export function toErrorResponse(
    message: string,
    code: string,
    details?: Record<string, unknown>
): ErrorWebResponse {
    return {
        success: false,
        message,
        error: {
            code,
            details,
        },
    }
}

/**
 * 例外を HTTP ステータスとエラーレスポンスに変換する
 */
export function mapError(error: unknown): MappedError {
    // ===== 認証・認可 =====

    if (error instanceof NotAuthenticatedException) {
        return { status: 401, body: toErrorResponse(error.message, 'NOT_AUTHENTICATED') }
    }

    if (error instanceof NotAuthorizedException) {
        return { status: 403, body: toErrorResponse(error.message, 'NOT_AUTHORIZED') }
    }

    // ===== 見つからない =====

    if (error instanceof ApiNotFoundException) {
        return {
            status: 404,
            body: toErrorResponse(error.message, 'API_NOT_FOUND', {
                organizationId: error.organizationId,
                apiId: error.apiId,
            }),
        }
    }

    if (error instanceof ApiVersionNotFoundException) {
        return {
            status: 404,
            body: toErrorResponse(error.message, 'API_VERSION_NOT_FOUND', {
                apiId: error.apiId,
                version: error.version,
            }),
        }
    }

    if (error instanceof ApiDefinitionNotFoundException) {
        return {
            status: 404,
            body: toErrorResponse(error.message, 'API_DEFINITION_NOT_FOUND', {
                apiId: error.apiId,
                version: error.version,
            }),
        }
    }

    if (error instanceof PlanNotFoundException) {
        return {
            status: 404,
            body: toErrorResponse(error.message, 'PLAN_NOT_FOUND', { planId: error.planId }),
        }
    }

    // ===== 競合・入力エラー =====

    if (error instanceof OrganizationAlreadyExistsException) {
        return {
            status: 409,
            body: toErrorResponse(error.message, 'ORGANIZATION_ALREADY_EXISTS', {
                organizationId: error.organizationId,
            }),
        }
    }

    if (error instanceof InvalidSearchCriteriaException) {
        return { status: 400, body: toErrorResponse(error.message, 'INVALID_SEARCH_CRITERIA') }
    }

    if (error instanceof InvalidNotificationStatusException) {
        return { status: 400, body: toErrorResponse(error.message, 'INVALID_NOTIFICATION_STATUS') }
    }

    // ===== その他のエラー =====

    // 予期しないエラー（インフラエラー、バグ等）
    console.error('Unexpected error:', error)

    const errorMessage = error instanceof Error ? error.message : 'Unknown error occurred'
    return { status: 500, body: toErrorResponse(errorMessage, 'INTERNAL_ERROR') }
}

/**
 * 例外をエラーレスポンスとして返す（ルートの catch 用）
 */
export function toErrorWebResponse(c: Context, error: unknown): Response {
    const { status, body } = mapError(error)
    return c.json(body, status)
}

/**
 * zValidator 用のフック
 *
 * バリデーションエラーを VALIDATION_ERROR（400）で返す。
 */
export function validationHook(
    result: { success: true } | { success: false; error: ZodError },
    c: Context
): Response | undefined {
    if (result.success) {
        return undefined
    }

    return c.json(
        toErrorResponse('Request validation failed', 'VALIDATION_ERROR', {
            issues: result.error.issues.map((issue) => ({
                path: issue.path.join('.'),
                message: issue.message,
            })),
        }),
        400
    )
}
