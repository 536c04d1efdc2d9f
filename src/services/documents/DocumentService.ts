import { ActivityStore, DocumentStore } from '../../database';
import { ActivityDocument, DocumentSubmission, MessageResponse } from '../../types';
import { NotFoundError } from '../../types/errors';
import { logger } from '../../utils/logger';

export class DocumentService {
    constructor(
        private readonly activities: ActivityStore,
        private readonly documents: DocumentStore
    ) {}

    /**
     * Records the metadata of an uploaded document. The file body is never kept.
     * Any integer score is accepted, negative ones included.
     */
    public submit(activityName: string, submission: DocumentSubmission): MessageResponse {
        this.requireActivity(activityName);
        this.documents.append(activityName, submission);

        logger.info(`[Documents] ${submission.email} uploaded ${submission.filename} for ${activityName}`, {
            contentType: submission.content_type,
            score: submission.score
        });
        return { message: `Uploaded ${submission.filename} for ${submission.email} in ${activityName}` };
    }

    public listDocuments(activityName: string): ActivityDocument[] {
        this.requireActivity(activityName);
        return this.documents.list(activityName);
    }

    // Only the document has to exist; the activity name is not checked separately
    public verify(activityName: string, email: string, filename: string): MessageResponse {
        this.documents.markVerified(activityName, email, filename);

        logger.info(`[Documents] Verified ${filename} for ${email} in ${activityName}`);
        return { message: `Verified ${filename} for ${email} in ${activityName}` };
    }

    private requireActivity(activityName: string): void {
        if (!this.activities.exists(activityName)) {
            throw new NotFoundError('Activity not found');
        }
    }
}
