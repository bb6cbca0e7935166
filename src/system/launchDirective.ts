function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function directivePattern(directive: string): RegExp {
  return new RegExp(`^(\\s*)#*\\s*${escapeRegExp(directive)}\\s*$`);
}

/**
 * Rewrites every line that holds `directive` (commented or not) to the
 * uncommented form when `enabled`, or to a single `#` comment otherwise.
 * Other lines, including ones that only contain the directive as a
 * prefix, are left alone. Running it twice gives the same text.
 */
export function toggleLaunchDirective(content: string, directive: string, enabled: boolean): string {
  const pattern = directivePattern(directive);
  return content
    .split('\n')
    .map((line) => {
      const match = pattern.exec(line.replace(/\r$/, ''));
      if (!match) return line;
      const indent = match[1] ?? '';
      const eol = line.endsWith('\r') ? '\r' : '';
      return `${indent}${enabled ? '' : '#'}${directive}${eol}`;
    })
    .join('\n');
}

