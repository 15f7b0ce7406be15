/**
 * 通知の受信者などに使うユーザー情報
 */
export interface UserDto {
    username: string
    fullName: string
    email: string | null
}
