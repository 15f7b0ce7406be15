import { injectable } from 'tsyringe'
import type { UserDto } from '../../../application/domain/model/User'
import type { UserDirectoryPort } from '../../../application/port/out/UserDirectoryPort'

interface UserData {
    user: UserDto
    roles: Set<string>
}

/**
 * インメモリのユーザーディレクトリ
 * 開発・テスト用の簡易実装
 */
@injectable()
export class InMemoryUserDirectoryAdapter implements UserDirectoryPort {
    private users = new Map<string, UserData>()

    constructor() {
        this.initializeTestData()
    }

    private initializeTestData(): void {
        this.addUser({ username: 'admin', fullName: 'Portal Admin', email: 'admin@example.com' }, [
            'admin',
            'approver',
            'api-approver',
        ])
        this.addUser({ username: 'alice', fullName: 'Alice Approver', email: 'alice@example.com' }, [
            'approver',
        ])
        this.addUser({ username: 'bob', fullName: 'Bob Developer', email: 'bob@example.com' }, [
            'developer',
        ])
    }

    /**
     * ユーザーを追加（同名のユーザーは上書き）
     */
    addUser(user: UserDto, roles: readonly string[] = []): void {
        this.users.set(user.username, { user: { ...user }, roles: new Set(roles) })
    }

    clear(): void {
        this.users.clear()
    }

    findUser(username: string): Promise<UserDto | null> {
        const data = this.users.get(username)
        return Promise.resolve(data ? { ...data.user } : null)
    }

    findUsersWithRole(role: string): Promise<UserDto[]> {
        const users = Array.from(this.users.values())
            .filter((data) => data.roles.has(role))
            .map((data) => ({ ...data.user }))
            .sort((a, b) => a.username.localeCompare(b.username))
        return Promise.resolve(users)
    }
}
