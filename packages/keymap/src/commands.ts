// packages/keymap/src/commands.ts
import { z } from 'zod/v4';
import registryData from './commands.json' with { type: 'json' };

const CommandRegistrySchema = z.strictObject({
  static: z.array(z.strictObject({ name: z.string(), doc: z.string() })),
  typable: z.array(
    z.strictObject({ name: z.string(), aliases: z.array(z.string()), doc: z.string() }),
  ),
});

const registry = CommandRegistrySchema.parse(registryData);

const staticCommands = new Map(registry.static.map((cmd) => [cmd.name, cmd.doc]));

/** 이름과 별칭 모두로 조회 가능한 typable 명령 */
const typableCommands = new Map<string, string>();
for (const cmd of registry.typable) {
  typableCommands.set(cmd.name, cmd.doc);
  for (const alias of cmd.aliases) {
    typableCommands.set(alias, cmd.doc);
  }
}

/** `:write foo` → `write` */
function typableName(text: string): string | undefined {
  if (!text.startsWith(':')) {
    return undefined;
  }
  return text.slice(1).trim().split(/\s+/)[0];
}

/**
 * 바인딩 가능한 명령인지 판별
 *
 * - 정적 명령: 이름 그대로 (`move_line_down`)
 * - typable 명령: `:` + 이름 또는 별칭, 뒤에 인자 허용 (`:sh echo hi`)
 */
export function isKnownCommand(text: string): boolean {
  const name = typableName(text);
  if (name !== undefined) {
    return typableCommands.has(name);
  }
  return staticCommands.has(text);
}

/** 명령 설명 조회 (알 수 없으면 undefined) */
export function describeCommand(text: string): string | undefined {
  const name = typableName(text);
  return name !== undefined ? typableCommands.get(name) : staticCommands.get(text);
}

/** 정적 명령 이름 목록 (등록 순서) */
export function staticCommandNames(): string[] {
  return [...staticCommands.keys()];
}
