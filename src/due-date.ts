import { format, isValid, parse, parseISO, setHours, setMinutes } from 'date-fns';

// Форматы ввода в порядке проверки; первый подошедший выигрывает
const DATE_TIME_FORMAT = 'yyyy-MM-dd HH:mm';
const DATE_ONLY_FORMAT = 'yyyy-MM-dd';

const DISPLAY_FORMAT = 'yyyy-MM-dd HH:mm';
const STORAGE_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

const REFERENCE_DATE = new Date(2000, 0, 1);

// date-fns принимает год из 1-4 цифр, поэтому форму ввода проверяем заранее
const INPUT_PATTERN = /^\d{4}-\d{1,2}-\d{1,2}( \d{1,2}:\d{1,2})?$/;

// В файле нужна хотя бы полная дата
const STORED_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}([T ]|$)/;

// Разбор срока из ввода пользователя. Без времени срок 23:59 этого дня;
// null для нераспознанного ввода, чтобы вызывающий мог переспросить
export function parseDueDate(text: string): Date | null {
  const input = text.trim();
  if (!INPUT_PATTERN.test(input)) {
    return null;
  }

  const withTime = parse(input, DATE_TIME_FORMAT, REFERENCE_DATE);
  if (isValid(withTime)) {
    return withTime;
  }

  const dateOnly = parse(input, DATE_ONLY_FORMAT, REFERENCE_DATE);
  if (isValid(dateOnly)) {
    return setMinutes(setHours(dateOnly, 23), 59);
  }

  return null;
}

export function formatDueDate(date: Date): string {
  return format(date, DISPLAY_FORMAT);
}

// Для tasks.json
export function serializeDueDate(date: Date): string {
  return format(date, STORAGE_FORMAT);
}

// Любая ISO-8601 дата или дата-время; null, если не разобрать
export function deserializeDueDate(text: string): Date | null {
  const input = text.trim();
  if (!STORED_DATE_PATTERN.test(input)) {
    return null;
  }
  const date = parseISO(input);
  return isValid(date) ? date : null;
}
