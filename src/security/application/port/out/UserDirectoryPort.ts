import type { UserDto } from '../../domain/model/User'

/**
 * ユーザーディレクトリの出力ポート
 *
 * 通知の受信者解決（個人・ロール）に使う。
 */
export interface UserDirectoryPort {
    /**
     * ユーザー名でユーザーを取得
     *
     * @returns 見つからない場合は null
     */
    findUser(username: string): Promise<UserDto | null>

    /**
     * 指定ロールを持つ全ユーザーを取得（ユーザー名順）
     */
    findUsersWithRole(role: string): Promise<UserDto[]>
}

/**
 * DI用のシンボル
 */
export const UserDirectoryPortToken = Symbol('UserDirectoryPort')
