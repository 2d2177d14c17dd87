/**
 * Tests for services, projects, profile services and todos
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

vi.mock('../../../../src/utils/logger.js', () => ({
  logger: { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() },
}));

import {
  addProfileService,
  createDatabase,
  addTodo,
  createProfile,
  createProject,
  createService,
  deleteProfile,
  deleteProfileService,
  deleteProject,
  deleteService,
  deleteTodo,
  getProject,
  getTodo,
  listProfileServices,
  listProjects,
  listServices,
  listTodos,
  openEntry,
  getEntry,
  setTodoCompleted,
  updateProfileServiceNotes,
  updateProject,
  updateService,
  updateTodoText,
  type Db,
} from '../../../../src/services/store/index.js';
import {
  NotFoundError,
  UniqueConstraintError,
  ValidationError,
} from '../../../../src/utils/errors.js';

describe('catalog storage', () => {
  let db: Db;
  let acmeId: number;

  beforeEach(() => {
    db = createDatabase(':memory:');
    acmeId = createProfile(db, { name: 'Acme' }).id;
  });

  afterEach(() => {
    db.close();
  });

  describe('services', () => {
    it('stores rates as integer cents', () => {
      const service = createService(db, { name: 'Consulting', rateCents: 8550 });
      expect(service).toEqual({ id: 1, name: 'Consulting', rateCents: 8550, estimatedSeconds: null });

      expect(() => createService(db, { name: 'Design', rateCents: 12.5 })).toThrow(ValidationError);
      expect(() => createService(db, { name: 'Design', rateCents: -1 })).toThrow(ValidationError);
    });

    it('keeps names unique and lists by name', () => {
      createService(db, { name: 'Support', rateCents: 5000 });
      const consulting = createService(db, { name: 'Consulting', rateCents: 8000 });

      expect(() => createService(db, { name: 'Support', rateCents: 1 })).toThrow(
        UniqueConstraintError
      );
      expect(listServices(db).map((s) => s.name)).toEqual(['Consulting', 'Support']);
      expect(updateService(db, consulting.id, { rateCents: 9000 }).rateCents).toBe(9000);
    });
  });

  describe('projects', () => {
    it('joins profile and service details', () => {
      const service = createService(db, { name: 'Consulting', rateCents: 8550 });
      const project = createProject(
        db,
        { profileId: acmeId, name: 'Website', serviceId: service.id, estimatedSeconds: 7200 },
        1000
      );

      expect(project).toMatchObject({
        profileId: acmeId,
        name: 'Website',
        profileName: 'Acme',
        serviceName: 'Consulting',
        rateCents: 8550,
        estimatedSeconds: 7200,
        invoiceSent: false,
        invoicePaid: false,
        createdTs: 1000,
      });
    });

    it('rejects unknown profiles and services', () => {
      expect(() => createProject(db, { profileId: 99, name: 'X' })).toThrow('Profile not found: 99');
      expect(() => createProject(db, { profileId: acmeId, name: 'X', serviceId: 99 })).toThrow(
        'Service not found: 99'
      );
    });

    it('lists newest first, optionally per profile', () => {
      const globexId = createProfile(db, { name: 'Globex' }).id;
      createProject(db, { profileId: acmeId, name: 'Old' }, 100);
      createProject(db, { profileId: acmeId, name: 'New' }, 200);
      createProject(db, { profileId: globexId, name: 'Other' }, 300);

      expect(listProjects(db, { profileId: acmeId }).map((p) => p.name)).toEqual(['New', 'Old']);
      expect(listProjects(db).map((p) => p.name)).toEqual(['Other', 'New', 'Old']);
    });

    it('updates flags and clears fields', () => {
      const project = createProject(db, { profileId: acmeId, name: 'Website', notes: 'draft' });
      const updated = updateProject(db, project.id, { invoiceSent: true, notes: null });

      expect(updated.invoiceSent).toBe(true);
      expect(updated.notes).toBeNull();
      expect(() => updateProject(db, project.id, {})).toThrow('No fields to update');
    });

    it('keeps entries when a project is deleted', () => {
      const project = createProject(db, { profileId: acmeId, name: 'Website' });
      const entry = openEntry(db, { profileId: acmeId, projectId: project.id }, 100);

      deleteProject(db, project.id);

      expect(getProject(db, project.id)).toBeNull();
      expect(getEntry(db, entry.id)?.projectId).toBeNull();
      expect(() => deleteProject(db, project.id)).toThrow(NotFoundError);
    });

    it('clears the service of projects when the service is deleted', () => {
      const service = createService(db, { name: 'Consulting', rateCents: 8550 });
      const project = createProject(db, { profileId: acmeId, name: 'Website', serviceId: service.id });
      addProfileService(db, { profileId: acmeId, serviceId: service.id });

      deleteService(db, service.id);

      expect(getProject(db, project.id)?.serviceId).toBeNull();
      expect(listProfileServices(db, acmeId)).toEqual([]);
    });
  });

  describe('profile services', () => {
    it('attaches, annotates and detaches services', () => {
      const service = createService(db, { name: 'Hosting', rateCents: 2000 });
      const attached = addProfileService(
        db,
        { profileId: acmeId, serviceId: service.id, notes: 'monthly' },
        500
      );

      expect(attached).toEqual({
        id: 1,
        profileId: acmeId,
        serviceId: service.id,
        notes: 'monthly',
        createdTs: 500,
        serviceName: 'Hosting',
        rateCents: 2000,
        estimatedSeconds: null,
      });
      expect(updateProfileServiceNotes(db, attached.id, null).notes).toBeNull();

      deleteProfileService(db, attached.id);
      expect(listProfileServices(db, acmeId)).toEqual([]);
      expect(() => deleteProfileService(db, attached.id)).toThrow(NotFoundError);
    });

    it('rejects unknown services', () => {
      expect(() => addProfileService(db, { profileId: acmeId, serviceId: 42 })).toThrow(
        'Service not found: 42'
      );
    });
  });

  describe('todos', () => {
    it('adds, completes, edits and deletes todos of each kind', () => {
      const project = createProject(db, { profileId: acmeId, name: 'Website' });
      const service = createService(db, { name: 'Hosting', rateCents: 2000 });
      const attached = addProfileService(db, { profileId: acmeId, serviceId: service.id });

      const profileTodo = addTodo(db, 'profile', acmeId, '  Send contract ', 10);
      const projectTodo = addTodo(db, 'project', project.id, 'Draft layout', 20);
      const serviceTodo = addTodo(db, 'profile_service', attached.id, 'Renew domain', 30);

      expect(profileTodo).toEqual({
        id: 1,
        kind: 'profile',
        parentId: acmeId,
        text: 'Send contract',
        completed: false,
        createdTs: 10,
      });
      expect(projectTodo.parentId).toBe(project.id);
      expect(serviceTodo.kind).toBe('profile_service');

      expect(setTodoCompleted(db, 'project', projectTodo.id, true).completed).toBe(true);
      expect(updateTodoText(db, 'project', projectTodo.id, 'Final layout').text).toBe('Final layout');

      deleteTodo(db, 'profile_service', serviceTodo.id);
      expect(getTodo(db, 'profile_service', serviceTodo.id)).toBeNull();
      expect(() => deleteTodo(db, 'profile_service', serviceTodo.id)).toThrow('Todo not found: 1');
    });

    it('lists oldest first', () => {
      addTodo(db, 'profile', acmeId, 'second', 20);
      addTodo(db, 'profile', acmeId, 'first', 10);

      expect(listTodos(db, 'profile', acmeId).map((t) => t.text)).toEqual(['first', 'second']);
    });

    it('rejects unknown parents and empty text', () => {
      expect(() => addTodo(db, 'project', 999, 'x')).toThrow('Project not found: 999');
      expect(() => addTodo(db, 'profile', acmeId, '   ')).toThrow(ValidationError);
      expect(() => setTodoCompleted(db, 'profile', 999, true)).toThrow(NotFoundError);
    });

    it('removes todos with their profile', () => {
      const project = createProject(db, { profileId: acmeId, name: 'Website' });
      addTodo(db, 'profile', acmeId, 'a');
      addTodo(db, 'project', project.id, 'b');

      deleteProfile(db, acmeId);

      expect(listTodos(db, 'profile', acmeId)).toEqual([]);
      expect(listTodos(db, 'project', project.id)).toEqual([]);
    });
  });
});
