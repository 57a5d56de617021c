import type { CommandOutput, PlaceholderDescriptor } from '../types/docs.js';

/**
 * Wrap finished text in a single section spanning all of it
 */
export function buildOutput(text: string, placeholder: PlaceholderDescriptor): CommandOutput {
  return {
    text,
    sections: [
      {
        range: { start: 0, end: Buffer.byteLength(text, 'utf8') },
        placeholder,
      },
    ],
    runCommandsInText: false,
  };
}

/**
 * One-line label for a section, e.g. `rustdoc (docs.rs): tokio::sync`
 */
export function placeholderLabel(placeholder: PlaceholderDescriptor): string {
  switch (placeholder.kind) {
    case 'rustdoc': {
      const cratePath = placeholder.modulePath
        ? `${placeholder.crateName}::${placeholder.modulePath}`
        : placeholder.crateName;
      return `rustdoc (${placeholder.source}): ${cratePath}`;
    }
    case 'rustdoc-index':
      return `rustdoc index (${placeholder.source}): ${placeholder.crateName}`;
  }
}
