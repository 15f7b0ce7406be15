import { describe, expect, it } from 'vitest'
import { accountApprovalEmail } from '../../../../../../src/notification/adapter/out/email/templates/AccountApprovalTemplate'
import { apiSignupApprovalEmail } from '../../../../../../src/notification/adapter/out/email/templates/ApiSignupApprovalTemplate'
import { escapeHtml, renderLayout, renderText } from '../../../../../../src/notification/adapter/out/email/templates/layout'
import { notificationDto } from '../../../../../helpers/fixtures'

describe('メールテンプレート', () => {
    describe('layout', () => {
        it('HTML の特殊文字をエスケープすること', () => {
            expect(escapeHtml(`<b>"x" & 'y'</b>`)).toBe('&lt;b&gt;&quot;x&quot; &amp; &#39;y&#39;&lt;/b&gt;')
        })

        it('行の値をエスケープして表に埋め込むこと', () => {
            const html = renderLayout('Title', 'Intro', [{ label: 'Name', value: '<script>' }])

            expect(html).toContain('<td style="padding: 10px 0; color: #333;">&lt;script&gt;</td>')
            expect(html).not.toContain('<script>')
        })

        it('行がなければテキスト版はタイトルと導入文だけになること', () => {
            expect(renderText('Title', 'Intro', [])).toBe('Title\n\nIntro\n')
        })
    })

    describe('accountApprovalEmail', () => {
        it('新規アカウントの情報をテキスト版に含めること', () => {
            const email = accountApprovalEmail(notificationDto(), 'alice@example.com')

            expect(email.to).toBe('alice@example.com')
            expect(email.subject).toBe('A new account needs approval')
            expect(email.text).toBe(
                [
                    'A new account needs approval',
                    '',
                    'Hello Alice Approver, A new account needs approval to gain access carol.',
                    '',
                    'Username: carol',
                    'Name: Carol Smith',
                    'Email: carol@example.com',
                ].join('\n')
            )
        })

        it('名前やメールアドレスがなければその行を省くこと', () => {
            const email = accountApprovalEmail(
                notificationDto({
                    payload: { username: 'carol', emailAddress: null, firstName: null, surname: null },
                }),
                'alice@example.com'
            )

            expect(email.text.split('\n').slice(4)).toEqual(['Username: carol'])
        })

        it('ペイロードの形が違っても本文を作れること', () => {
            const email = accountApprovalEmail(notificationDto({ payload: null }), 'alice@example.com')

            expect(email.text).toBe(
                'A new account needs approval\n\nHello Alice Approver, A new account needs approval to gain access carol.\n'
            )
        })
    })

    describe('apiSignupApprovalEmail', () => {
        it('申請内容をテキスト版に含めること', () => {
            const email = apiSignupApprovalEmail(
                notificationDto({
                    reason: 'api.approval.request',
                    reasonMessage: 'bob requested access to acme/weather 1.0 (plan gold)',
                    recipient: { username: 'admin', fullName: 'Portal Admin', email: 'admin@example.com' },
                    payload: {
                        organizationId: 'acme',
                        apiId: 'weather',
                        apiVersion: '1.0',
                        planId: 'gold',
                        planVersion: '1',
                        requestedBy: 'bob',
                    },
                }),
                'admin@example.com'
            )

            expect(email.subject).toBe('API signup awaiting approval')
            expect(email.text).toBe(
                [
                    'API signup awaiting approval',
                    '',
                    'Hello Portal Admin, bob requested access to acme/weather 1.0 (plan gold).',
                    '',
                    'Requested by: bob',
                    'API: acme/weather',
                    'Version: 1.0',
                    'Plan: gold',
                ].join('\n')
            )
        })
    })
})
