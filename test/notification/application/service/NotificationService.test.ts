import 'reflect-metadata'

import { beforeEach, describe, expect, it, vi } from 'vitest'
import { EventBus } from '../../../../src/common/event/EventBus'
import { NotificationDispatchedEvent } from '../../../../src/common/event/events/NotificationDispatchedEvent'
import { SystemErrorException } from '../../../../src/common/exception/SystemErrorException'
import { InMemoryNotificationRepository } from '../../../../src/notification/adapter/out/persistence/InMemoryNotificationRepository'
import { InvalidNotificationStatusException } from '../../../../src/notification/application/domain/exception/InvalidNotificationStatusException'
import type {
    CreateNotificationDto,
    NotificationDto,
    RecipientDto,
} from '../../../../src/notification/application/domain/model/Notification'
import { NotificationService } from '../../../../src/notification/application/service/NotificationService'
import { InMemoryUserDirectoryAdapter } from '../../../../src/security/adapter/out/persistence/InMemoryUserDirectoryAdapter'

/**
 * NotificationService のテスト
 *
 * 【テスト戦略】
 * - 永続化とユーザーディレクトリはインメモリアダプターを使う
 * - EventBus は実物を使い、発行された NotificationDispatchedEvent を記録する
 */
describe('NotificationService', () => {
    let repository: InMemoryNotificationRepository
    let directory: InMemoryUserDirectoryAdapter
    let service: NotificationService
    let dispatched: NotificationDto[]

    function request(recipient: RecipientDto[], overrides: Partial<CreateNotificationDto> = {}): CreateNotificationDto {
        return {
            recipient,
            category: 'USER_ADMINISTRATION',
            reason: 'account.approval.request',
            reasonMessage: 'A new account needs approval to gain access carol',
            source: 'http://localhost/api',
            payload: { username: 'carol', at: new Date('2024-05-01T00:00:00Z') },
            ...overrides,
        }
    }

    beforeEach(() => {
        repository = new InMemoryNotificationRepository()
        directory = new InMemoryUserDirectoryAdapter()
        const eventBus = new EventBus()
        dispatched = []
        eventBus.subscribe<NotificationDispatchedEvent>(NotificationDispatchedEvent.TYPE, (event) => {
            dispatched.push(event.notification)
            return Promise.resolve()
        })

        service = new NotificationService(repository, directory, eventBus)
    })

    describe('sendNotification', () => {
        it('ロールの全ユーザーに通知を保存し、受信者ごとにイベントを発行すること', async () => {
            await service.sendNotification(request([{ recipient: 'approver', recipientType: 'ROLE' }]))

            expect(dispatched.map((dto) => dto.recipient.username)).toEqual(['admin', 'alice'])
            expect(dispatched.map((dto) => dto.id)).toEqual([1, 2])
            expect(dispatched[1]).toMatchObject({
                status: 'OPEN',
                category: 'USER_ADMINISTRATION',
                reason: 'account.approval.request',
                source: 'http://localhost/api',
                recipient: { username: 'alice', fullName: 'Alice Approver', email: 'alice@example.com' },
            })
            await expect(service.unreadNotifications('alice')).resolves.toBe(1)
        })

        it('ペイロードを JSON ツリーとして保存すること', async () => {
            await service.sendNotification(request([{ recipient: 'bob', recipientType: 'INDIVIDUAL' }]))

            expect(dispatched[0].payload).toEqual({ username: 'carol', at: '2024-05-01T00:00:00.000Z' })
        })

        it('複数の宛先に該当するユーザーには宛先ごとに送ること', async () => {
            await service.sendNotification(
                request([
                    { recipient: 'alice', recipientType: 'INDIVIDUAL' },
                    { recipient: 'approver', recipientType: 'ROLE' },
                ])
            )

            expect(dispatched.map((dto) => dto.recipient.username)).toEqual(['alice', 'admin', 'alice'])
            await expect(service.unreadNotifications('alice')).resolves.toBe(2)
        })

        it('存在しないユーザー宛ての通知は作られないこと', async () => {
            await service.sendNotification(request([{ recipient: 'ghost', recipientType: 'INDIVIDUAL' }]))

            expect(dispatched).toEqual([])
            await expect(service.unreadNotifications('ghost')).resolves.toBe(0)
        })
    })

    describe('getLatestNotifications', () => {
        beforeEach(async () => {
            for (const reasonMessage of ['first', 'second', 'third']) {
                await service.sendNotification(
                    request([{ recipient: 'alice', recipientType: 'INDIVIDUAL' }], { reasonMessage })
                )
            }
        })

        it('新しい順にページングして返すこと', async () => {
            const results = await service.getLatestNotifications('alice', { page: 1, pageSize: 2 })

            expect(results.beans.map((notification) => notification.reasonMessage)).toEqual(['third', 'second'])
            expect(results.totalSize).toBe(3)
        })

        it('ページング省略時は既定のページサイズで返すこと', async () => {
            const results = await service.getLatestNotifications('alice')

            expect(results.beans).toHaveLength(3)
        })
    })

    describe('markNotificationsAsRead', () => {
        beforeEach(async () => {
            await service.sendNotification(request([{ recipient: 'alice', recipientType: 'INDIVIDUAL' }]))
            await service.sendNotification(request([{ recipient: 'alice', recipientType: 'INDIVIDUAL' }]))
        })

        it('受信者本人の通知を既読にすること', async () => {
            await service.markNotificationsAsRead('alice', [1], 'USER_DISMISSED')

            await expect(service.unreadNotifications('alice')).resolves.toBe(1)
        })

        it('他人の通知は変更されないこと', async () => {
            await service.markNotificationsAsRead('bob', [1, 2], 'USER_DISMISSED')

            await expect(service.unreadNotifications('alice')).resolves.toBe(2)
        })

        it('OPEN を指定すると InvalidNotificationStatusException になること', async () => {
            await expect(service.markNotificationsAsRead('alice', [1], 'OPEN')).rejects.toThrow(
                InvalidNotificationStatusException
            )
        })

        it('ID が空なら何もしないこと', async () => {
            const markRead = vi.spyOn(repository, 'markReadByIds')

            await service.markNotificationsAsRead('alice', [], 'OPEN')

            expect(markRead).not.toHaveBeenCalled()
        })
    })

    describe('getNotificationPreference', () => {
        it('保存された設定を返し、なければ null を返すこと', async () => {
            repository.savePreference({ userId: 'alice', type: 'email', enabled: false })

            await expect(service.getNotificationPreference('alice', 'email')).resolves.toEqual({
                userId: 'alice',
                type: 'email',
                enabled: false,
            })
            await expect(service.getNotificationPreference('bob', 'email')).resolves.toBeNull()
        })
    })

    it('ストレージのエラーは SystemErrorException として伝播すること', async () => {
        vi.spyOn(repository, 'countUnreadByRecipient').mockRejectedValue(new Error('connection refused'))

        await expect(service.unreadNotifications('alice')).rejects.toThrow(SystemErrorException)
    })
})
