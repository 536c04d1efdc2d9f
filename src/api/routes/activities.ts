import { RequestHandler, Router } from 'express';
import { ActivityController } from '../controllers/activities/activity.controller';
import { DocumentController } from '../controllers/activities/document.controller';
import { EnrollmentController } from '../controllers/activities/enrollment.controller';
import { asyncHandler } from '../middleware';
import { Services } from '../../services';

export const createActivitiesRouter = (services: Services, uploadFile: RequestHandler): Router => {
  const router = Router();
  const activityController = new ActivityController(services.query);
  const enrollmentController = new EnrollmentController(services.enrollment);
  const documentController = new DocumentController(services.documents);

  // Listing and ranked views
  router.get('/', asyncHandler(activityController.getActivities));
  router.get('/sorted', asyncHandler(activityController.getSortedActivities));
  router.get('/:name/participants/sorted', asyncHandler(activityController.getSortedParticipants));

  // Roster
  router.post('/:name/signup', asyncHandler(enrollmentController.signup));
  router.delete('/:name/unregister', asyncHandler(enrollmentController.unregister));

  // Documents
  router.post('/:name/upload', uploadFile, asyncHandler(documentController.upload));
  router.get('/:name/documents', asyncHandler(documentController.getDocuments));
  router.post('/:name/verify', asyncHandler(documentController.verify));

  return router;
};
