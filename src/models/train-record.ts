export interface TrainRecord {
    trainNumber: string;
    trainName: string;
    trainType: string;
    source: string;
    departureTime: string;
    destination: string;
    arrivalTime: string;
    duration: string;
    bookingAvailable: boolean;
    advanceReservationPeriod: string;
    startDate: string;
    endDate: string;
    bookingClasses: string[];
    notices: string[];
    hasPantry: boolean;
    isLimitedRun: boolean;
}

/**
 * A record after temporal normalisation. `departureDateTime` is a wall-clock
 * value in the query's time zone, stored in the Date's UTC fields.
 */
export interface ScheduledTrain extends TrainRecord {
    departureDateTime: Date;
}

/** Wire/export shape, field names as published by the API. */
export interface TrainRecordJson {
    train_number: string;
    train_name: string;
    train_type: string;
    source: string;
    departure_time: string;
    destination: string;
    arrival_time: string;
    duration: string;
    booking_available: boolean;
    advance_reservation_period: string;
    start_date: string;
    end_date: string;
    booking_classes: string[];
    notices: string[];
    has_pantry: boolean;
    is_limited_run: boolean;
    departure_datetime: string;
}
