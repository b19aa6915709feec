/**
 * GraphQL schema
 * Field names follow the camelCase convention of the public API
 */

import { buildSchema } from 'graphql';

export const typeDefs = /* GraphQL */ `
  "A single item on the todo list"
  type Task {
    id: Int!
    title: String!
    description: String!
    completed: Boolean!
  }

  input TaskInput {
    title: String!
    description: String!
    completed: Boolean! = false
  }

  "Omitted or null fields keep their current value"
  input TaskUpdateInput {
    title: String
    description: String
    completed: Boolean
  }

  type Query {
    tasks: [Task!]!
    "Null when no task has this id"
    task(taskId: Int!): Task
    "Fails with TASK_NOT_FOUND when no task has this id"
    taskStrict(taskId: Int!): Task!
  }

  type Mutation {
    createTask(taskInput: TaskInput!): Task!
    updateTask(taskId: Int!, taskInput: TaskUpdateInput!): Task
    updateTaskStrict(taskId: Int!, taskInput: TaskUpdateInput!): Task!
    deleteTask(taskId: Int!): Boolean!
    deleteTaskStrict(taskId: Int!): Boolean!
  }
`;

export const schema = buildSchema(typeDefs);
