import { Request, Response } from 'express';
import { EnrollmentService } from '../../../services/enrollment/EnrollmentService';
import { requireString } from '../../validation/params';

export class EnrollmentController {
    constructor(private readonly enrollmentService: EnrollmentService) {}

    public signup = (req: Request, res: Response): void => {
        const email = requireString(req.query.email, 'email', 'query');
        res.json(this.enrollmentService.signup(req.params.name, email));
    };

    public unregister = (req: Request, res: Response): void => {
        const email = requireString(req.query.email, 'email', 'query');
        res.json(this.enrollmentService.unregister(req.params.name, email));
    };
}
