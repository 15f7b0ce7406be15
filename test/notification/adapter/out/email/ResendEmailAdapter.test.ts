import { beforeEach, describe, expect, it, vi } from 'vitest'
import { ResendEmailAdapter } from '../../../../../src/notification/adapter/out/email/ResendEmailAdapter'
import type { EmailMessage } from '../../../../../src/notification/application/port/out/EmailSenderPort'

/**
 * ResendEmailAdapter のテスト
 *
 * 【テスト戦略】
 * - Resend API をモック化して、実際のメール送信を行わない
 * - 正しいパラメータで API が呼ばれることを検証
 * - エラーハンドリングをテスト
 */

// モック関数を作成（vi.mock の巻き上げより先に初期化する）
const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }))

// Resend モジュール全体をモック化
vi.mock('resend', () => {
    return {
        Resend: vi.fn().mockImplementation(function () {
            return {
                emails: {
                    send: mockSend,
                },
            }
        }),
    }
})

const FROM = 'API Portal <notifications@example.com>'

const message: EmailMessage = {
    to: 'alice@example.com',
    subject: 'A new account needs approval',
    html: '<p>Hello</p>',
    text: 'Hello',
}

describe('ResendEmailAdapter', () => {
    let adapter: ResendEmailAdapter

    beforeEach(() => {
        // モックをリセット
        vi.clearAllMocks()

        adapter = new ResendEmailAdapter('test-api-key', FROM)
    })

    describe('send - 正常系', () => {
        it('送信元と本文を付けてメール送信 API を呼び出すこと', async () => {
            // Given: Resend API が成功を返すようにモック
            mockSend.mockResolvedValueOnce({
                data: { id: 'test-email-id' },
                error: null,
            })

            // When
            await adapter.send(message)

            // Then: 正しいパラメータで API が呼ばれること
            expect(mockSend).toHaveBeenCalledTimes(1)
            expect(mockSend).toHaveBeenCalledWith({
                from: FROM,
                to: 'alice@example.com',
                subject: 'A new account needs approval',
                html: '<p>Hello</p>',
                text: 'Hello',
            })
        })
    })

    describe('send - 異常系', () => {
        it('Resend API がエラーを返した場合、例外をスローすること', async () => {
            // Given: Resend API がエラーを返すようにモック
            mockSend.mockResolvedValueOnce({
                data: null,
                error: { message: 'API rate limit exceeded', name: 'rate_limit_exceeded' },
            })

            // When & Then
            await expect(adapter.send(message)).rejects.toThrow('Email sending failed: API rate limit exceeded')
        })

        it('Resend API が予期しないエラーをスローした場合、例外が伝播すること', async () => {
            mockSend.mockRejectedValueOnce(new Error('Network error'))

            await expect(adapter.send(message)).rejects.toThrow('Network error')
        })
    })
})
