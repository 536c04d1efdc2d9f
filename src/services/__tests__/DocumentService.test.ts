import { describe, it, expect, beforeEach } from 'vitest';
import { createStore, Store } from '../../database';
import { DocumentService } from '../documents/DocumentService';
import { NotFoundError } from '../../types/errors';

describe('DocumentService', () => {
  let store: Store;
  let service: DocumentService;

  beforeEach(() => {
    store = createStore();
    service = new DocumentService(store.activities, store.documents);
  });

  it('records submissions as unverified metadata', () => {
    const result = service.submit('Chess Club', {
      email: 'daniel@mergington.edu',
      filename: 'tournament.pdf',
      content_type: 'application/pdf',
      score: 88
    });

    expect(result).toEqual({ message: 'Uploaded tournament.pdf for daniel@mergington.edu in Chess Club' });
    expect(service.listDocuments('Chess Club')).toEqual([
      {
        email: 'daniel@mergington.edu',
        filename: 'tournament.pdf',
        content_type: 'application/pdf',
        score: 88,
        verified: false
      }
    ]);
  });

  it('accepts negative scores', () => {
    service.submit('Chess Club', { email: 'daniel@mergington.edu', filename: 'x.txt', content_type: 'text/plain', score: -3 });
    expect(service.listDocuments('Chess Club')[0].score).toBe(-3);
  });

  it('rejects submissions for unknown activities without storing them', () => {
    expect(() => service.submit('Robotics', {
      email: 'ada@mergington.edu',
      filename: 'robot.pdf',
      content_type: 'application/pdf',
      score: 1
    })).toThrow(NotFoundError);
    expect(store.documents.list('Robotics')).toEqual([]);
  });

  it('lists an empty sequence for a known activity with no uploads', () => {
    expect(service.listDocuments('Art Club')).toEqual([]);
  });

  it('fails to list documents of an unknown activity', () => {
    expect(() => service.listDocuments('Robotics')).toThrow('Activity not found');
  });

  it('verifies exactly the first matching record', () => {
    service.submit('Chess Club', { email: 'daniel@mergington.edu', filename: 'cert.pdf', content_type: 'application/pdf', score: 70 });
    service.submit('Chess Club', { email: 'michael@mergington.edu', filename: 'cert.pdf', content_type: 'application/pdf', score: 75 });
    service.submit('Chess Club', { email: 'daniel@mergington.edu', filename: 'cert.pdf', content_type: 'application/pdf', score: 90 });

    const result = service.verify('Chess Club', 'daniel@mergington.edu', 'cert.pdf');

    expect(result).toEqual({ message: 'Verified cert.pdf for daniel@mergington.edu in Chess Club' });
    expect(service.listDocuments('Chess Club').map(doc => doc.verified)).toEqual([true, false, false]);
  });

  it('reports Document not found when nothing matches, even for unknown activities', () => {
    expect(() => service.verify('Chess Club', 'daniel@mergington.edu', 'missing.pdf')).toThrow('Document not found');
    expect(() => service.verify('Robotics', 'daniel@mergington.edu', 'cert.pdf')).toThrow('Document not found');
  });
});
