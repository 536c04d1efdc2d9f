import { ActivityDocument, DocumentSubmission } from '../../types';
import { NotFoundError } from '../../types/errors';

/**
 * Submitted documents per activity, in submission order.
 * Does not check that the activity exists; the services do that.
 */
export class DocumentStore {
    private readonly documents = new Map<string, ActivityDocument[]>();

    public append(activityName: string, submission: DocumentSubmission): ActivityDocument {
        const document: ActivityDocument = { ...submission, verified: false };

        let documents = this.documents.get(activityName);
        if (!documents) {
            documents = [];
            this.documents.set(activityName, documents);
        }
        documents.push(document);

        return { ...document };
    }

    public list(activityName: string): ActivityDocument[] {
        return (this.documents.get(activityName) ?? []).map(document => ({ ...document }));
    }

    /**
     * Flags the first document matching both email and filename.
     * Later duplicates of the same pair are left untouched.
     */
    public markVerified(activityName: string, email: string, filename: string): ActivityDocument {
        const document = (this.documents.get(activityName) ?? [])
            .find(doc => doc.email === email && doc.filename === filename);
        if (!document) {
            throw new NotFoundError('Document not found');
        }

        document.verified = true;
        return { ...document };
    }
}
