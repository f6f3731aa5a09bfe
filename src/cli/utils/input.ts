import { createInterface } from 'readline';

export async function promptUser(question: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

/**
 * Read a secret without echoing it. Falls back to a plain prompt when stdin is not a terminal.
 */
export async function promptSecure(question: string): Promise<string> {
  if (!process.stdin.isTTY) {
    return promptUser(question);
  }

  return new Promise((resolve, reject) => {
    process.stdout.write(question);
    process.stdin.setRawMode(true);
    process.stdin.resume();

    let input = '';

    const finish = (): void => {
      process.stdin.setRawMode(false);
      process.stdin.pause();
      process.stdin.removeListener('data', onData);
    };

    const onData = (data: Buffer): void => {
      for (const c of data.toString()) {
        switch (c) {
          case '\n':
          case '\r':
            finish();
            process.stdout.write('\n');
            resolve(input);
            return;
          case '\u0003': // Ctrl+C
            finish();
            process.stdout.write('\n');
            reject(new Error('Input cancelled'));
            return;
          case '\u007f': // Backspace
            if (input.length > 0) {
              input = input.slice(0, -1);
              process.stdout.write('\b \b');
            }
            break;
          default:
            if (c >= ' ' && c <= '~') {
              input += c;
              process.stdout.write('*');
            }
            break;
        }
      }
    };

    process.stdin.on('data', onData);
  });
}

export async function promptConfirm(question: string, defaultValue: boolean = false): Promise<boolean> {
  const defaultText = defaultValue ? 'Y/n' : 'y/N';
  const answer = await promptUser(`${question} (${defaultText}): `);

  if (answer.length === 0) {
    return defaultValue;
  }

  return answer.toLowerCase().startsWith('y');
}

export async function promptChoice<T>(
  question: string,
  choices: ReadonlyArray<{ label: string; value: T; description?: string }>,
  defaultIndex?: number
): Promise<T> {
  console.log(question);
  console.log('');

  choices.forEach((choice, index) => {
    const marker = index === defaultIndex ? '●' : '○';
    const description = choice.description ? ` - ${choice.description}` : '';
    console.log(`  ${marker} ${index + 1}. ${choice.label}${description}`);
  });

  console.log('');

  for (;;) {
    const answer = await promptUser('Enter your choice (number): ');
    const index = answer === '' && defaultIndex !== undefined ? defaultIndex : parseInt(answer, 10) - 1;
    const choice = choices[index];

    if (choice !== undefined) {
      return choice.value;
    }

    console.log(`Please enter a number between 1 and ${choices.length}`);
  }
}

/**
 * Prompt for an integer, returning the default on empty input
 */
export async function promptInteger(
  question: string,
  defaultValue: number,
  isValid: (value: number) => boolean
): Promise<number> {
  for (;;) {
    const answer = await promptUser(`${question} (${defaultValue}): `);
    if (answer === '') return defaultValue;

    const parsed = Number(answer);
    if (Number.isInteger(parsed) && isValid(parsed)) return parsed;

    console.log('Please enter a valid number');
  }
}
