import type { AppProfile, Credentials } from '../core/types'

export interface PromptOptions {
  mfaWaitSeconds: number
  /** Login already driven locally; the agent only signs in if still logged out */
  loginHandled?: boolean
}

/**
 * Builds the single instruction handed to the agent: login steps with the
 * literal credentials, the task, then save/reload verification.
 */
export function buildAgentPrompt(app: AppProfile, task: string, credentials: Credentials, options: PromptOptions): string {
  const loginPreamble = options.loginHandled
    ? `The browser may already be signed in to ${app.name}. Only follow these steps if a login screen is shown.\n`
    : ''

  return `You are an AI agent helping to capture UI states for: ${task}

=== LOGIN INSTRUCTIONS ===
${loginPreamble}1. Navigate to ${app.url}
2. Click the login button or link
3. When asked for email, ENTER EXACTLY: ${credentials.identity}
4. When asked for password, ENTER EXACTLY: ${credentials.secret}
5. When prompted for 2FA/authentication code, WAIT UP TO ${options.mfaWaitSeconds} SECONDS for the user to enter it
6. Do NOT try multiple times - wait the full time for user input in the browser
7. Once browser shows workspace (sidebar visible), then proceed with task
8. If login fails after full wait, report failure - DO NOT loop

=== MAIN TASK ===
${task}

=== EXECUTION STEPS ===
1. Complete the entire task as described
2. Save and confirm all changes
3. Wait 3 seconds for persistence
4. RELOAD THE ENTIRE PAGE (press F5 or refresh)
5. Wait 2 seconds for page to load
6. Report success when complete`
}
