/**
 * HTML helpers
 *
 * Every piece of user text goes through escapeHtml before it reaches a page.
 */

const ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => ESCAPES[char] ?? char);
}

export interface Flash {
  notice?: string;
  error?: string;
}

const STYLES = `
  body { font-family: system-ui, sans-serif; max-width: 760px; margin: 2rem auto; padding: 0 1rem; color: #222; }
  header { display: flex; justify-content: space-between; align-items: baseline; }
  a { color: #2563eb; }
  .flash { padding: .6rem .9rem; border-radius: 6px; margin: 1rem 0; }
  .flash.notice { background: #e7f6ec; border: 1px solid #9bd3ac; }
  .flash.error { background: #fdecec; border: 1px solid #f0a3a3; }
  .stats { background: #f4f4f5; padding: .6rem .9rem; border-radius: 6px; }
  ul.todos { list-style: none; padding: 0; }
  ul.todos li { display: flex; gap: .6rem; align-items: center; padding: .5rem 0; border-bottom: 1px solid #eee; }
  li.completed .title { text-decoration: line-through; color: #888; }
  .overdue { color: #b91c1c; font-weight: 600; }
  form.inline { display: inline; }
  label { display: block; margin-top: .8rem; }
  input[type=text], textarea { width: 100%; padding: .4rem; }
`;

/**
 * Full page around a body
 */
export function layout(title: string, body: string, flash: Flash = {}): string {
  const messages = [
    flash.notice ? `<div class="flash notice">${escapeHtml(flash.notice)}</div>` : '',
    flash.error ? `<div class="flash error">${escapeHtml(flash.error)}</div>` : '',
  ].join('');

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>${escapeHtml(title)} · Todos</title>
  <style>${STYLES}</style>
</head>
<body>
  <header>
    <h1><a href="/">Todos</a></h1>
    <a href="/todo/new">New todo</a>
  </header>
  ${messages}
  <main>
${body}
  </main>
</body>
</html>`;
}
