import multer, { StorageEngine } from 'multer';

/**
 * Multer storage that reads the uploaded stream to the end and keeps only its
 * size. Filename and mimetype stay on req.file; the bytes go nowhere.
 */
export const metadataOnlyStorage: StorageEngine = {
  _handleFile(_req, file, cb) {
    let size = 0;
    file.stream.on('data', (chunk: Buffer) => {
      size += chunk.length;
    });
    file.stream.on('error', err => cb(err));
    file.stream.on('end', () => cb(null, { size }));
  },
  _removeFile(_req, _file, cb) {
    cb(null);
  }
};

export const createUpload = (maxUploadBytes: number) => multer({
  storage: metadataOnlyStorage,
  // Browsers send raw UTF-8 in filename="..."
  defParamCharset: 'utf8',
  limits: { fileSize: maxUploadBytes, files: 1 }
});
