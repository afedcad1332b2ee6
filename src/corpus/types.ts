export type CustomFieldValue = string | number | boolean;

export interface Organization {
  id: number;
  name: string;
  domain: string;
  createdAt: string;
}

export interface Team {
  id: number;
  organizationId: number;
  name: string;
  department: string;
}

export interface User {
  id: number;
  organizationId: number;
  teamId: number;
  name: string;
  email: string;
  department: string;
}

export type ProjectStatus = 'active' | 'completed' | 'archived';

export interface Project {
  id: number;
  organizationId: number;
  teamId: number;
  name: string;
  department: string;
  workItemType: string;
  status: ProjectStatus;
  startDate: string;
  endDate?: string;
}

/** A board column of a project; `position` orders the columns from 0. */
export interface Section {
  id: number;
  projectId: number;
  name: string;
  position: number;
}

export interface Task {
  id: number;
  projectId: number;
  sectionId: number;
  assigneeId?: number;
  name: string;
  description?: string;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  dueDate?: string;
  completed: boolean;
  overdue: boolean;
  cycleTimeDays?: number;
  leadTimeDays?: number;
  customFields: Record<string, CustomFieldValue>;
}

export interface Subtask {
  id: number;
  taskId: number;
  assigneeId?: number;
  name: string;
  createdAt: string;
  completed: boolean;
  completedAt?: string;
}

export interface Comment {
  id: number;
  taskId: number;
  authorId: number;
  body: string;
  createdAt: string;
}

export interface Tag {
  id: number;
  organizationId: number;
  name: string;
  color: string;
  createdAt: string;
}

export interface TaskTag {
  taskId: number;
  tagId: number;
}

export interface Corpus {
  generatedAt: string;
  now: string;
  seed: number;
  organizations: Organization[];
  teams: Team[];
  users: User[];
  projects: Project[];
  sections: Section[];
  tasks: Task[];
  subtasks: Subtask[];
  comments: Comment[];
  tags: Tag[];
  taskTags: TaskTag[];
}
