export type Authorization = { allowed: true } | { allowed: false; reason: string };

/**
 * Явная проверка прав админа. Каждый админский обработчик вызывает её первой строкой.
 */
export function checkAdmin(telegramId: number | undefined, adminIds: readonly number[]): Authorization {
  if (telegramId === undefined) {
    return { allowed: false, reason: 'Не удалось определить пользователя' };
  }
  if (!adminIds.includes(telegramId)) {
    return { allowed: false, reason: 'Доступ запрещён: нужны права администратора' };
  }
  return { allowed: true };
}
