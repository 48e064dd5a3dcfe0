import { UserCancellationError } from '../../src/dictionary/errors/dictionary.errors';
import { Terminal } from '../../src/dictionary/services/terminal.service';

/**
 * Answers prompts from a fixed script. Running out of answers behaves like
 * the user pressing CTRL+C at the prompt.
 */
export class ScriptedTerminal extends Terminal {
  readonly lines: string[] = [];
  readonly questions: string[] = [];
  readonly hiddenQuestions: string[] = [];
  opened = false;
  closeCalls = 0;
  cancelled = false;

  constructor(private readonly answers: string[] = []) {
    super();
  }

  open(): void {
    this.opened = true;
  }

  async ask(question: string): Promise<string> {
    this.questions.push(question);
    return this.next();
  }

  async askHidden(question: string): Promise<string> {
    this.hiddenQuestions.push(question);
    return this.next();
  }

  print(message: string): void {
    this.lines.push(message);
  }

  throwIfCancelled(): void {
    if (this.cancelled) {
      throw new UserCancellationError();
    }
  }

  close(): void {
    this.closeCalls += 1;
  }

  private next(): string {
    const answer = this.answers.shift();
    if (answer === undefined) {
      throw new UserCancellationError();
    }
    return answer;
  }
}
