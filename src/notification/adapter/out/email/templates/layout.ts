const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;',
}

export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char)
}

/**
 * メール本文の行（ラベルと値）
 */
export interface DetailRow {
    label: string
    value: string
}

/**
 * 通知メール共通の HTML レイアウト
 *
 * 値はすべてエスケープされる。
 */
export function renderLayout(title: string, intro: string, rows: readonly DetailRow[]): string {
    const tableRows = rows
        .map(
            (row) => `
                <tr>
                    <td style="padding: 10px 0; color: #666; font-weight: bold;">${escapeHtml(row.label)}</td>
                    <td style="padding: 10px 0; color: #333;">${escapeHtml(row.value)}</td>
                </tr>`
        )
        .join('')

    return `
<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${escapeHtml(title)}</title>
</head>
<body style="font-family: Arial, sans-serif; padding: 20px; background-color: #f5f5f5;">
    <div style="max-width: 600px; margin: 0 auto; background-color: white; padding: 30px; border-radius: 10px;">
        <h1 style="color: #333; margin-bottom: 20px;">${escapeHtml(title)}</h1>
        <p style="color: #666; font-size: 16px; line-height: 1.6;">${escapeHtml(intro)}</p>
        <div style="background-color: #f5f5f5; padding: 20px; border-radius: 5px; margin: 20px 0;">
            <table style="width: 100%; border-collapse: collapse;">${tableRows}
            </table>
        </div>
        <hr style="margin-top: 30px; border: none; border-top: 1px solid #eee;">
        <p style="font-size: 12px; color: #999; margin-top: 20px;">
            This message was sent automatically by the API portal.
        </p>
    </div>
</body>
</html>
    `.trim()
}

/**
 * テキスト版の本文
 */
export function renderText(title: string, intro: string, rows: readonly DetailRow[]): string {
    return [title, '', intro, '', ...rows.map((row) => `${row.label}: ${row.value}`)].join('\n')
}
