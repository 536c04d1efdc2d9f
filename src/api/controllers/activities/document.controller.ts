import { Request, Response } from 'express';
import { DocumentService } from '../../../services/documents/DocumentService';
import { InvalidArgumentError } from '../../../types/errors';
import { parseInteger, readField, requireString } from '../../validation/params';

/**
 * Achievement documents: upload (metadata only), listing and admin verification
 */
export class DocumentController {
    constructor(private readonly documentService: DocumentService) {}

    public upload = (req: Request, res: Response): void => {
        const body: unknown = req.body;
        const email = requireString(readField(body, 'email'), 'email', 'form');
        const score = parseInteger(readField(body, 'score'), 'score', 'form');

        const file = req.file;
        if (!file) {
            throw new InvalidArgumentError('Invalid file: Field required', [
                { field: 'file', location: 'form', message: 'Field required' }
            ]);
        }

        res.json(this.documentService.submit(req.params.name, {
            email,
            filename: file.originalname,
            content_type: file.mimetype,
            score
        }));
    };

    public getDocuments = (req: Request, res: Response): void => {
        res.json(this.documentService.listDocuments(req.params.name));
    };

    public verify = (req: Request, res: Response): void => {
        const email = requireString(req.query.email, 'email', 'query');
        const filename = requireString(req.query.filename, 'filename', 'query');

        res.json(this.documentService.verify(req.params.name, email, filename));
    };
}
