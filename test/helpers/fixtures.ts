import { sign } from 'hono/jwt'
import type { NotificationDto } from '../../src/notification/application/domain/model/Notification'

export const TEST_JWT_SECRET = 'test-secret'
export const TEST_SSO_TOKEN = 'test-sso-token'

/**
 * テスト用の通知 DTO
 */
export function notificationDto(overrides: Partial<NotificationDto> = {}): NotificationDto {
    return {
        id: 1,
        category: 'USER_ADMINISTRATION',
        reason: 'account.approval.request',
        reasonMessage: 'A new account needs approval to gain access carol',
        status: 'OPEN',
        recipient: { username: 'alice', fullName: 'Alice Approver', email: 'alice@example.com' },
        source: 'http://localhost/api',
        payload: {
            username: 'carol',
            emailAddress: 'carol@example.com',
            firstName: 'Carol',
            surname: 'Smith',
        },
        createdOn: new Date('2024-05-01T10:00:00Z'),
        modifiedOn: new Date('2024-05-01T10:00:00Z'),
        ...overrides,
    }
}

/**
 * Authorization ヘッダー（HS256 の JWT）を作る
 */
export async function bearerFor(
    username: string,
    secret: string = TEST_JWT_SECRET
): Promise<Record<string, string>> {
    const token = await sign(
        { sub: username, exp: Math.floor(Date.now() / 1000) + 3600 },
        secret,
        'HS256'
    )
    return { Authorization: `Bearer ${token}` }
}
