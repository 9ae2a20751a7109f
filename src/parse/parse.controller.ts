import { Body, Controller, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { QueryParserService } from '../engine/parsing/query-parser.service.js';
import {
  ParseQueryBodySchema,
  toParsedQueryResponse,
  toRawQuery,
  type ParseQueryBody,
  type ParsedQueryResponse,
} from './dto/parse-query.dto.js';

@Controller('parse')
export class ParseController {
  constructor(private readonly queryParser: QueryParserService) {}

  /** Raw service request → structured, vector-tagged record */
  @Post()
  @HttpCode(HttpStatus.OK)
  parse(
    @Body(new ZodValidationPipe(ParseQueryBodySchema)) body: ParseQueryBody,
  ): ParsedQueryResponse {
    const parsed = this.queryParser.parse(toRawQuery(body));
    return toParsedQueryResponse(parsed);
  }
}
