import { formatDateTime, type Todo, type TodoStats } from '@todo/shared-types';
import { isOverdue } from '@todo/insights';
import { escapeHtml, layout, type Flash } from './html.js';

/** Values shown in the create and edit forms */
export interface TodoFormValues {
  title: string;
  description: string;
  /** YYYY-MM-DD, or empty for none */
  due_date: string;
  completed: boolean;
}

export const EMPTY_FORM: TodoFormValues = {
  title: '',
  description: '',
  due_date: '',
  completed: false,
};

function todoPath(todo: Todo, action = ''): string {
  return `/todo/${encodeURIComponent(todo.id)}${action}`;
}

function dueLabel(todo: Todo, now: Date): string {
  if (!todo.due_date) return '';
  const overdue = isOverdue(todo, now);
  return ` <span class="due${overdue ? ' overdue' : ''}">due ${escapeHtml(formatDateTime(todo.due_date))}${overdue ? ' (overdue)' : ''}</span>`;
}

function statsBanner(stats: TodoStats): string {
  if (!stats.has_todos) {
    return '<p class="stats">No todos yet. <a href="/todo/new">Add one</a>.</p>';
  }
  return `<p class="stats">${stats.total} total · ${stats.completed_count} completed · ${stats.incomplete_count} open · ${stats.completion_percentage}% complete · ${stats.overdue_count} overdue</p>`;
}

function todoItem(todo: Todo, now: Date): string {
  return `    <li class="${todo.completed ? 'completed' : 'open'}">
      <form class="inline" method="post" action="${todoPath(todo, '/toggle')}">
        <button type="submit">${todo.completed ? 'Reopen' : 'Done'}</button>
      </form>
      <a class="title" href="${todoPath(todo)}">${escapeHtml(todo.title)}</a>${dueLabel(todo, now)}
      <a href="${todoPath(todo, '/edit')}">Edit</a>
      <form class="inline" method="post" action="${todoPath(todo, '/delete')}">
        <button type="submit">Delete</button>
      </form>
    </li>`;
}

export function renderIndex(todos: Todo[], stats: TodoStats, now: Date, flash: Flash): string {
  const list = todos.length
    ? `<ul class="todos">\n${todos.map((todo) => todoItem(todo, now)).join('\n')}\n</ul>`
    : '';
  return layout('All todos', `${statsBanner(stats)}\n${list}`, flash);
}

export function renderDetail(todo: Todo, now: Date, flash: Flash = {}): string {
  const body = `<h2>${escapeHtml(todo.title)}</h2>
<p>${todo.description ? escapeHtml(todo.description) : '<em>No description</em>'}</p>
<dl>
  <dt>Status</dt><dd>${todo.completed ? 'Completed' : 'Open'}</dd>
  <dt>Due</dt><dd>${todo.due_date ? `${escapeHtml(formatDateTime(todo.due_date))}${isOverdue(todo, now) ? ' <span class="overdue">(overdue)</span>' : ''}` : 'No due date'}</dd>
  <dt>Created</dt><dd>${escapeHtml(formatDateTime(todo.created_at))}</dd>
  <dt>Updated</dt><dd>${escapeHtml(formatDateTime(todo.updated_at))}</dd>
</dl>
<p>
  <a href="${todoPath(todo, '/edit')}">Edit</a>
  <form class="inline" method="post" action="${todoPath(todo, '/toggle')}"><button type="submit">${todo.completed ? 'Reopen' : 'Mark done'}</button></form>
  <form class="inline" method="post" action="${todoPath(todo, '/delete')}"><button type="submit">Delete</button></form>
</p>`;
  return layout(todo.title, body, flash);
}

export function renderForm(options: {
  action: string;
  heading: string;
  values: TodoFormValues;
  error?: string;
}): string {
  const { action, heading, values, error } = options;
  const body = `<h2>${escapeHtml(heading)}</h2>
<form method="post" action="${escapeHtml(action)}">
  <label>Title <input type="text" name="title" value="${escapeHtml(values.title)}" required maxlength="100"></label>
  <label>Description <textarea name="description" rows="4" maxlength="500">${escapeHtml(values.description)}</textarea></label>
  <label>Due date <input type="date" name="due_date" value="${escapeHtml(values.due_date)}"></label>
  <label><input type="checkbox" name="completed"${values.completed ? ' checked' : ''}> Completed</label>
  <p><button type="submit">Save</button> <a href="/">Cancel</a></p>
</form>`;
  return layout(heading, body, error ? { error } : {});
}

export function renderError(message: string): string {
  return layout('Error', '<p><a href="/">Back to the list</a></p>', { error: message });
}
