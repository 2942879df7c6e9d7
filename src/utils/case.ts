/** `maxMessageSize` → `max_message_size` */
export function camelToSnake(name: string): string {
  return name.replace(/[A-Z]/g, (letter) => `_${letter.toLowerCase()}`);
}

/** `max_message_size` → `maxMessageSize` */
export function snakeToCamel(name: string): string {
  return name.replace(/_([a-z0-9])/g, (_match, letter: string) =>
    letter.toUpperCase()
  );
}
