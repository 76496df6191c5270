import * as clack from "@clack/prompts";

export type Confirm = (message: string) => Promise<boolean>;

/** Yes/no question on the terminal. Cancelling (Ctrl-C, Esc) counts as "no". */
export const terminalConfirm: Confirm = async (message) => {
  const answer = await clack.confirm({ message, initialValue: false });
  if (clack.isCancel(answer)) return false;
  return answer;
};
