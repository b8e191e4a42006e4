/**
 * Copyright (c) 2024 Discover Financial Services
*/
import { Config, ConfigOpts } from "./config.js";
import { Context } from "./context.js";
import { CharDictionary } from "./dictionary.js";
import { Image, NamedImageInfo, PixelImage } from "./image.js";
import { Log } from "./log.js";
import { OCV } from "./ocv.js";
import { OcrResult, runOcr } from "./pipeline.js";
import { RecognitionModel, SequenceRecognizer } from "./recognizer.js";
import { Env, Util } from "./util.js";

export interface OCRInitArgs {
    model: RecognitionModel;
    /** Defaults to the printable ASCII dictionary shipped with the package. */
    dictionary?: CharDictionary;
    config?: ConfigOpts;
}

/** Decoded pixels, or the bytes of an encoded image file. */
export type ScanImage = PixelImage | Buffer | ArrayBuffer | Uint8Array;

export interface ScanRequest {
    id: string;
    image: ScanImage;
    /** Overrides of the engine's configuration for this request only. */
    config?: ConfigOpts;
    /** Debug categories; "images" returns the intermediate images. */
    debug?: string[];
    logLevel?: string;
}

export interface ScanResponse {
    id: string;
    result: OcrResult;
    images?: NamedImageInfo[];
}

function isPixelImage(image: ScanImage): image is PixelImage {
    return !(image instanceof ArrayBuffer) && !ArrayBuffer.isView(image);
}

/**
 * OCR engine.  Owns one recognition model; use one instance per worker.
 */
export class OCR {

    public static async new(args: OCRInitArgs): Promise<OCR> {
        await OCV.init();
        const dictionary = args.dictionary || await CharDictionary.fromFile();
        const ocr = new OCR(args.model, dictionary);
        if (args.config && args.config.logLevel) {
            const levelName = args.config.logLevel;
            Log.setLogLevel(levelName);
            if (!ocr.ctx.setLogLevel(levelName)) throw new Error(`'${levelName}' is an invalid log level name`);
        }
        ocr.init(args);
        return ocr;
    }

    /**
     * Create an engine configured from OCR_* environment variables.
     */
    public static async newByEnv(model: RecognitionModel, env: Env, opts?: { dictionary?: CharDictionary }): Promise<OCR> {
        opts = opts || {};
        return await OCR.new({ model, dictionary: opts.dictionary, config: Config.fromEnv(env) });
    }

    public readonly cfg: Config;
    public readonly ctx: Context;
    public readonly model: RecognitionModel;
    public readonly dictionary: CharDictionary;
    private stopped = false;

    private constructor(model: RecognitionModel, dictionary: CharDictionary) {
        this.model = model;
        this.dictionary = dictionary;
        this.cfg = new Config();
        this.ctx = this.newContext("glyph-ocr");
    }

    private init(args: OCRInitArgs) {
        this.ctx.debug(`Initializing OCR`);
        if (args.config) this.cfg.merge(args.config);
        this.cfg.validate();
        this.ctx.debug(`Initialized OCR with model ${this.model.name} and ${this.dictionary.size} classes`);
    }

    public stop() {
        if (this.stopped) return;
        this.ctx.debug(`Stopping OCR`);
        this.stopped = true;
        this.model.delete();
        this.ctx.release();
        this.ctx.debug(`Stopped OCR`);
    }

    public isStopped(): boolean {
        return this.stopped;
    }

    public newContext(id: string, cfg?: Config): Context {
        return Context.obtain(id, cfg || this.cfg);
    }

    public newRecognizer(cfg?: Config): SequenceRecognizer {
        return new SequenceRecognizer(this.model, this.dictionary, cfg || this.cfg);
    }

    /**
     * Run the pipeline on an image already owned by a context.
     * @param opts Configuration overrides for this run
     */
    public run(image: Image, opts?: ConfigOpts): OcrResult {
        this.assertRunning();
        const cfg = opts ? this.cfg.clone(opts).validate() : this.cfg;
        return runOcr(image, this.newRecognizer(cfg), cfg);
    }

    /**
     * Scan one image.  All OpenCV memory used by the request is released
     * before the promise settles.
     * @throws if the request's configuration or log level is invalid, or an
     * encoded image cannot be decoded
     */
    public async scan(req: ScanRequest): Promise<ScanResponse> {
        this.assertRunning();
        const cfg = req.config ? this.cfg.clone(req.config).validate() : this.cfg;
        const ctx = this.newContext(req.id, cfg);
        try {
            ctx.debugImages = Util.debug(req, "images");
            if (req.logLevel && !ctx.setLogLevel(req.logLevel)) throw new Error(`'${req.logLevel}' is an invalid log level name`);
            if (ctx.isDebugEnabled()) ctx.debug(`Begin scan ${req.id}`);
            const image = isPixelImage(req.image)
                ? Image.fromPixels(req.image, ctx)
                : await Image.fromBuffer(req.image, ctx);
            if (ctx.debugImages && !image.isEmpty()) image.display("original");
            const result = runOcr(image, this.newRecognizer(cfg), cfg);
            const rtn: ScanResponse = { id: req.id, result };
            if (!ctx.images.isEmpty()) rtn.images = await ctx.images.serialize();
            if (ctx.isDebugEnabled()) ctx.debug(`Done scan ${req.id}: found ${result.spans.length} spans`);
            return rtn;
        } finally {
            ctx.release();
        }
    }

    private assertRunning() {
        if (this.stopped) throw new Error(`OCR has been stopped`);
    }

}
