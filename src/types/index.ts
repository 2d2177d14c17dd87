/**
 * timeledger - Type Definitions
 */

// Client/billing entity that owns entries, projects and todos
export interface Profile {
  id: number;
  name: string;
  color: string | null;
  archived: boolean;
  targetSeconds: number | null;
  company: string | null;
  contactPerson: string | null;
  email: string | null;
  phone: string | null;
  businessAddress: string | null;
  notes: string | null;
}

// Bounded unit of work under a profile
export interface Project {
  id: number;
  profileId: number;
  name: string;
  estimatedSeconds: number | null;
  serviceId: number | null;
  deadlineTs: number | null;
  startDateTs: number | null;
  invoiceSent: boolean;
  invoicePaid: boolean;
  notes: string | null;
  createdTs: number;
}

// Project joined with its profile and service
export interface ProjectDetails extends Project {
  profileName: string;
  serviceName: string | null;
  rateCents: number | null;
}

// Catalog entry; the rate is hourly, in cents
export interface Service {
  id: number;
  name: string;
  rateCents: number;
  estimatedSeconds: number | null;
}

// A service attached to a profile
export interface ProfileService {
  id: number;
  profileId: number;
  serviceId: number;
  notes: string | null;
  createdTs: number;
}

export interface ProfileServiceDetails extends ProfileService {
  serviceName: string;
  rateCents: number;
  estimatedSeconds: number | null;
}

// One tracked interval; open while endTs is null
export interface TimeEntry {
  id: number;
  profileId: number;
  projectId: number | null;
  startTs: number; // epoch seconds
  endTs: number | null; // epoch seconds
  note: string;
  tags: string[];
}

// Entry joined with profile and project names, as listed and exported
export interface TimeEntryDetails extends TimeEntry {
  profileName: string;
  profileColor: string | null;
  projectName: string | null;
}

export type TodoKind = 'profile' | 'project' | 'profile_service';

export interface Todo {
  id: number;
  kind: TodoKind;
  parentId: number;
  text: string;
  completed: boolean;
  createdTs: number;
}

// Tool response types
export interface ToolSuccess<T = unknown> {
  success: true;
  data: T;
}

export interface ToolError {
  success: false;
  error: string;
  code?: string;
}

export type ToolResult<T = unknown> = ToolSuccess<T> | ToolError;

// Runtime configuration
export interface TimeLedgerConfig {
  dataDir: string;
  dbPath: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  tickIntervalMs: number;
  busyTimeoutMs: number;
}
