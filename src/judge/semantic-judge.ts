/**
 * Reads a prompt and answers it in free text. The first line of the reply
 * carries the verdict token.
 */
export interface SemanticJudge {
  judge(prompt: string): Promise<string>;
}
