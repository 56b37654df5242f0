export type OutputMode = 'json' | 'human';
const OUTPUT_SCHEMA_VERSION = '1.0.0';

export function renderOutput(command: string, data: unknown, mode: OutputMode) {
  if (mode === 'json') {
    return JSON.stringify(
      {
        ok: true,
        schema_version: OUTPUT_SCHEMA_VERSION,
        command,
        data,
      },
      null,
      2,
    );
  }

  return renderHuman(command, data);
}

function yesNo(value: unknown) {
  return value ? 'yes' : 'no';
}

function renderHuman(command: string, data: unknown): string {
  if (command === 'target' && typeof data === 'object' && data !== null) {
    const typed = data as {
      api_url?: string;
      user?: string;
      org?: string;
      space?: string;
      login_required?: boolean;
      target_required?: boolean;
    };
    return [
      `api: ${typed.api_url ?? 'unknown'}`,
      `user: ${typed.user ?? 'unknown'}`,
      `org: ${typed.org ?? 'unknown'}`,
      `space: ${typed.space ?? 'unknown'}`,
      `login required: ${yesNo(typed.login_required)}`,
      `target required: ${yesNo(typed.target_required)}`,
    ].join('\n');
  }

  if (command === 'instances' && Array.isArray(data)) {
    if (data.length === 0) {
      return 'No service instances.';
    }
    return data
      .map((entry, index) => {
        const typed = entry as { name?: string; guid?: string };
        return `${index + 1}. ${typed.name ?? 'unnamed'} (${typed.guid ?? 'no guid'})`;
      })
      .join('\n');
  }

  if (Array.isArray(data)) {
    if (data.length === 0) {
      return 'No results.';
    }
    return data.map((entry, index) => `${index + 1}. ${typeof entry === 'string' ? entry : JSON.stringify(entry)}`).join('\n');
  }

  if (typeof data === 'object' && data !== null) {
    return Object.entries(data)
      .map(([key, value]) => `${key}: ${typeof value === 'string' ? value : JSON.stringify(value)}`)
      .join('\n');
  }

  return String(data);
}
