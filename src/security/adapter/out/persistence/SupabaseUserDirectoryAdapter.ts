import { inject, injectable } from 'tsyringe'
import type { TypedSupabaseClient } from '../../../../config/types'
import { SupabaseClientToken } from '../../../../config/types'
import type { UserDto } from '../../../application/domain/model/User'
import type { UserDirectoryPort } from '../../../application/port/out/UserDirectoryPort'
import type { UserRecord } from './entities/UserRecord'
import { UserRecordSchema, UserRoleRecordSchema } from './entities/UserRecord'

function toUserDto(record: UserRecord): UserDto {
    return {
        username: record.username,
        fullName: record.full_name ?? record.username,
        email: record.email,
    }
}

/**
 * Supabase の users / user_roles テーブルを使ったユーザーディレクトリ
 */
@injectable()
export class SupabaseUserDirectoryAdapter implements UserDirectoryPort {
    constructor(
        @inject(SupabaseClientToken) private readonly supabase: TypedSupabaseClient
    ) {}

    async findUser(username: string): Promise<UserDto | null> {
        const { data, error } = await this.supabase
            .from('users')
            .select('*')
            .eq('username', username)
            .maybeSingle()

        if (error) {
            throw new Error(`Failed to load user: ${error.message}`)
        }

        if (data === null) {
            return null
        }

        return toUserDto(UserRecordSchema.parse(data))
    }

    /**
     * 1. user_roles からロールを持つユーザー名を取得
     * 2. users からそのユーザーを取得
     */
    async findUsersWithRole(role: string): Promise<UserDto[]> {
        const { data: roleRows, error: roleError } = await this.supabase
            .from('user_roles')
            .select('*')
            .eq('role', role)

        if (roleError) {
            throw new Error(`Failed to load user roles: ${roleError.message}`)
        }

        const usernames = UserRoleRecordSchema.array()
            .parse(roleRows)
            .map((row) => row.username)

        if (usernames.length === 0) {
            return []
        }

        const { data: userRows, error: userError } = await this.supabase
            .from('users')
            .select('*')
            .in('username', usernames)
            .order('username', { ascending: true })

        if (userError) {
            throw new Error(`Failed to load users: ${userError.message}`)
        }

        return UserRecordSchema.array().parse(userRows).map(toUserDto)
    }
}
