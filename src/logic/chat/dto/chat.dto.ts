import { Type } from 'class-transformer';
import {
    ArrayMaxSize,
    IsArray,
    IsBoolean,
    IsNotEmpty,
    IsNumber,
    IsOptional,
    IsString,
    Max,
    MaxLength,
    Min,
    ValidateBy,
    ValidateNested,
    ValidationOptions,
} from 'class-validator';
import { ConversationTurn } from '../../../utils/types';

function IsStringOrNumber(options?: ValidationOptions): PropertyDecorator {
    return ValidateBy({
        name: 'isStringOrNumber',
        validator: {
            validate: (value: unknown) => typeof value === 'string' || (typeof value === 'number' && Number.isFinite(value)),
            defaultMessage: () => '$property must be a string or a finite number',
        },
    }, options);
}

export class QueryRequestDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(8000)
    query!: string;

    @IsOptional()
    @IsString()
    model?: string;

    @IsOptional()
    @IsNumber()
    @Min(0)
    @Max(2)
    temperature?: number;

    @IsOptional()
    @IsBoolean()
    enableInternetSearch?: boolean;
}

export class StatelessQueryDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(8000)
    query!: string;

    @IsOptional()
    @IsString()
    model?: string;
}

export class AnalysisDetailDto {
    @IsString()
    @IsNotEmpty()
    name!: string;

    @IsStringOrNumber()
    value!: string | number;

    @IsOptional()
    @IsString()
    unit?: string;
}

export class AnalyzeRequestDto {
    @IsString()
    @IsNotEmpty()
    @MaxLength(8000)
    prompt!: string;

    @IsArray()
    @ArrayMaxSize(500)
    @ValidateNested({ each: true })
    @Type(() => AnalysisDetailDto)
    details!: AnalysisDetailDto[];

    @IsOptional()
    @IsString()
    model?: string;

    @IsOptional()
    @IsNumber()
    @Min(0)
    @Max(2)
    temperature?: number;
}

export interface QueryResponse {
    query: string;
    userId: string;
    generation: string;
    model: string;
    history: ConversationTurn[];
}

export interface AnalyzeResponse {
    prompt: string;
    userId: string;
    generation: string;
    model: string;
    details: AnalysisDetailDto[];
}

export interface HistoryResponse {
    userId: string;
    messageCount: number;
    history: ConversationTurn[];
}

export interface ClearHistoryResponse {
    userId: string;
    messagesDeleted: number;
}

export type ChatErrorCode = 'GENERATION_FAILED' | 'HISTORY_LOAD_FAILED' | 'HISTORY_NOT_PERSISTED' | 'REQUEST_TIMEOUT';

export interface ChatErrorBody {
    code: ChatErrorCode;
    message: string;
    generation?: string;
}
