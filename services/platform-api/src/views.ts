/**
 * Server-rendered pages. Every interpolated value goes through escapeHtml.
 */

const HTML_ESCAPES: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#39;'
};

export function escapeHtml(value: string): string {
    return value.replace(/[&<>"']/g, ch => HTML_ESCAPES[ch] ?? ch);
}

function layout(title: string, body: string): string {
    return [
        '<!DOCTYPE html>',
        '<html lang="en">',
        '<head>',
        '<meta charset="utf-8">',
        `<title>${escapeHtml(title)}</title>`,
        '</head>',
        `<body>${body}</body>`,
        '</html>'
    ].join('\n');
}

export interface LoginView {
    error?: string;
    message?: string;
    loginUrl: string;
}

export function renderLogin(view: LoginView): string {
    const notices = [
        view.error ? `<p class="error">${escapeHtml(view.error)}</p>` : '',
        view.message ? `<p class="message">${escapeHtml(view.message)}</p>` : ''
    ].join('');

    return layout('Login', [
        '<h1>Sign in</h1>',
        notices,
        `<form method="post" action="${escapeHtml(view.loginUrl)}">`,
        '<label>Username <input name="username" autocomplete="username"></label>',
        '<label>Password <input name="password" type="password" autocomplete="current-password"></label>',
        '<button type="submit">Log in</button>',
        '</form>'
    ].join('\n'));
}

export interface DashboardView {
    title: string;
    healthUrl: string;
    endpoints: readonly string[];
}

export function renderDashboard(view: DashboardView): string {
    const items = view.endpoints.map(endpoint => `<li><code>${escapeHtml(endpoint)}</code></li>`).join('');

    return layout(view.title, [
        `<h1>${escapeHtml(view.title)}</h1>`,
        `<p>Health: <a href="${escapeHtml(view.healthUrl)}">${escapeHtml(view.healthUrl)}</a></p>`,
        `<ul>${items}</ul>`
    ].join('\n'));
}
