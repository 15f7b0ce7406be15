/**
 * 検索結果（1ページ分の要素と総件数）
 */
export interface SearchResults<T> {
    beans: T[]
    totalSize: number
}
