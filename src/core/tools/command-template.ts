import { ConfigError } from '../../utils/errors.js';

/**
 * Values substituted into tool argument templates.
 */
export type TemplateValues = Partial<Record<'outDir' | 'source' | 'root' | 'prefix', string>>;

const PLACEHOLDER = /\{([A-Za-z]+)\}/g;

/**
 * Expand `{placeholder}` tokens in each argument. A token without a value
 * is a recipe error, never passed through literally.
 */
export function expandArgs(args: readonly string[], values: TemplateValues): string[] {
  const known = new Map<string, string>(
    Object.entries(values).filter((entry): entry is [string, string] => typeof entry[1] === 'string')
  );

  return args.map(arg =>
    arg.replace(PLACEHOLDER, (_match, key: string) => {
      const value = known.get(key);
      if (value === undefined) {
        throw new ConfigError(`Unknown placeholder {${key}} in tool argument '${arg}'`, { placeholder: key });
      }
      return value;
    })
  );
}

/**
 * Render a command line for logs and dry runs.
 */
export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map(part => (/[\s"'$]/.test(part) ? `'${part.replace(/'/g, `'\\''`)}'` : part))
    .join(' ');
}
