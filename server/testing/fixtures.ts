/** Small task-tracker integration used by the runtime and HTTP tests. */
export const tasksIntegration = {
  name: 'tasks',
  base: {
    baseUrl: 'https://api.example.com',
    headers: { authorization: 'Bearer {{connection.apiKey}}' },
    response: { error: '{{body.message}}' },
  },
  functions: [{ name: 'shout', code: 'function shout(text) { return String(text).toUpperCase() + "!"; }' }],
  connections: {
    key: { type: 'apikey', parameters: [{ name: 'apiKey', required: true }], info: { url: '/me' } },
  },
  modules: {
    createTask: {
      type: 'action',
      connection: 'key',
      parameters: [{ name: 'title', required: true }],
      communication: { url: '/tasks', method: 'POST', body: { title: '{{shout(parameters.title)}}' } },
    },
    listTasks: {
      type: 'search',
      connection: 'key',
      communication: { url: '/tasks', response: { iterate: '{{body.items}}', output: { id: '{{item.id}}' } } },
    },
    newTasks: {
      type: 'trigger',
      connection: 'key',
      communication: {
        url: '/tasks',
        response: { iterate: '{{body.items}}', output: '{{item.id}}', trigger: { id: '{{item.id}}', order: 'asc' } },
      },
    },
    taskEvents: { type: 'instant', webhook: 'taskEvents' },
  },
  rpcs: {
    projects: {
      connection: 'key',
      communication: { url: '/projects', response: { iterate: '{{body}}', output: { label: '{{item.name}}', value: '{{item.id}}' } } },
    },
    sections: {
      connection: 'key',
      parameters: [{ name: 'projectId', required: true }],
      nested: { rpc: 'projects', parameter: 'projectId' },
      communication: { url: '/projects/{{parameters.projectId}}/sections', response: { iterate: '{{body}}' } },
    },
  },
  webhooks: {
    taskEvents: { connection: 'key', response: { iterate: '{{body.tasks}}' } },
  },
};
