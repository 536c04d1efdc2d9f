import { Store } from '../database';
import { DocumentService } from './documents/DocumentService';
import { EnrollmentService } from './enrollment/EnrollmentService';
import { QueryService } from './query/QueryService';

export { DocumentService, EnrollmentService, QueryService };

export interface Services {
    enrollment: EnrollmentService;
    documents: DocumentService;
    query: QueryService;
}

export function createServices(store: Store): Services {
    return {
        enrollment: new EnrollmentService(store.activities),
        documents: new DocumentService(store.activities, store.documents),
        query: new QueryService(store.activities, store.documents)
    };
}
