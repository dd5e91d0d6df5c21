import type { AppProfile } from '../core/types'

// Detection walks this table in insertion order, so keep broader keys last
export const builtInApps: Record<string, AppProfile> = {
  notion: {
    key: 'notion',
    name: 'Notion',
    url: 'https://www.notion.so',
    loginUrl: 'https://www.notion.so/login',
    emailSelector: "input[type='email']",
    passwordSelector: "input[type='password']",
    submitSelector: "button[type='submit']",
    mfaWaitSeconds: 15,
    complex: false,
  },

  linear: {
    key: 'linear',
    name: 'Linear',
    url: 'https://linear.app',
    loginUrl: 'https://linear.app/login',
    emailSelector: "input[type='email']",
    passwordSelector: "input[type='password']",
    submitSelector: "button[type='submit']",
    mfaWaitSeconds: 15,
    complex: false,
  },

  asana: {
    key: 'asana',
    name: 'Asana',
    url: 'https://app.asana.com',
    loginUrl: 'https://app.asana.com/-/login',
    emailSelector: "input[type='email']",
    passwordSelector: "input[type='password']",
    submitSelector: "button[type='submit']",
    mfaWaitSeconds: 15,
    complex: false,
  },

  github: {
    key: 'github',
    name: 'GitHub',
    url: 'https://github.com',
    loginUrl: 'https://github.com/login',
    emailSelector: "input[name='login']",
    passwordSelector: "input[name='password']",
    submitSelector: "input[type='submit']",
    mfaWaitSeconds: 15,
    complex: false,
  },

  jira: {
    key: 'jira',
    name: 'Jira',
    url: 'https://www.atlassian.com/software/jira',
    loginUrl: 'https://id.atlassian.com/login',
    emailSelector: "input[name='email']",
    passwordSelector: "input[name='password']",
    submitSelector: "button[type='submit']",
    mfaWaitSeconds: 15,
    complex: false,
  },

  monday: {
    key: 'monday',
    name: 'monday.com',
    url: 'https://monday.com',
    loginUrl: 'https://auth.monday.com/login',
    emailSelector: "input[type='email']",
    passwordSelector: "input[type='password']",
    submitSelector: "button[type='submit']",
    mfaWaitSeconds: 15,
    complex: true,
  },
}

export const exampleTasks: string[] = [
  'Create a database in Notion',
  'Create a project in Linear',
  'Add a task in Asana',
  'Create an issue in GitHub',
]
