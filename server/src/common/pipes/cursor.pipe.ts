import { BadRequestException, Injectable, PipeTransform } from "@nestjs/common";
import { Cursor, cursorFromString, emptyCursor } from "../dto/envelopes";

/**
 * Turns the opaque `cursor` query parameter into a keyset position.
 */
@Injectable()
export class ParseCursorPipe
	implements PipeTransform<string | undefined, Cursor>
{
	transform(value: string | undefined): Cursor {
		if (value === undefined || value === "") return emptyCursor;
		let cursor: Cursor;
		try {
			cursor = cursorFromString(value);
		} catch {
			throw new BadRequestException(`Invalid cursor: ${value}`);
		}
		if (cursor.idBefore !== undefined && cursor.idBefore < 1) {
			throw new BadRequestException(`Cursor out of range: ${value}`);
		}
		return cursor;
	}
}
