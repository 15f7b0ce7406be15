import { NotAuthenticatedException } from '../../../../common/exception/NotAuthenticatedException'

/**
 * リクエストごとの認証情報
 *
 * 匿名アクセスの場合 currentUser は null。
 */
export class SecurityContext {
    private constructor(private readonly currentUser: string | null) {}

    static anonymous(): SecurityContext {
        return new SecurityContext(null)
    }

    static forUser(username: string): SecurityContext {
        return new SecurityContext(username)
    }

    getCurrentUser(): string | null {
        return this.currentUser
    }

    isLoggedIn(): boolean {
        return this.currentUser !== null
    }

    /**
     * ログイン中のユーザー名を返す
     *
     * @throws NotAuthenticatedException 匿名アクセスの場合
     */
    requireCurrentUser(): string {
        if (this.currentUser === null) {
            throw new NotAuthenticatedException()
        }
        return this.currentUser
    }
}
